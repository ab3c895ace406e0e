export { paystackWebhookRoutes } from "./routes/paystack-webhook.routes.js";
