export * as Config from "./config";
export * as Logger from "./logger";
export * as Store from "./record_store";
export * as Tables from "./table_store";

// Most callers only need the store itself
export { RecordStore } from "./record_store";
export type {
  ConnectionStatus,
  Filters,
  RecordId,
  StoreRecord,
  StoreResult,
} from "./record_store";
