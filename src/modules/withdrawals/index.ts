export { withdrawalRoutes } from "./routes/withdrawals.routes.js";
