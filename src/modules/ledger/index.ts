export { ledgerRoutes } from "./routes/ledger.routes.js";
