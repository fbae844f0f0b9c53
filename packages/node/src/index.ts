/**
 * @tradeledger/node — HTTP operation surface for the trade ledger.
 *
 * @packageDocumentation
 */

export { LedgerContract, INVOKE_OPERATIONS, QUERY_OPERATIONS, resultFormat } from "./services/ledger-contract.js";
export type {
  LedgerContractOptions,
  ResultFormat,
  InvokeOperation,
  QueryOperation,
} from "./services/ledger-contract.js";
export { loadConfig, parseApiKeys, parseParticipants, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
