export { packageRoutes } from "./routes/packages.routes.js";
