/**
 * @swapledger/node: HTTP node hosting one SwapLedger exchange.
 */

export { LedgerService } from "./services/ledger-service.js";
export type { EventTypeInfo, LedgerHealth } from "./services/ledger-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
