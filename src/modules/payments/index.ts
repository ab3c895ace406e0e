export { paymentRoutes } from "./routes/payments.routes.js";
