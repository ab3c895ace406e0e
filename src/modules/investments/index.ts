export { investmentRoutes } from "./routes/investments.routes.js";
