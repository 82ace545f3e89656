/**
 * Ledger module - Asset custody abstraction
 */

export type { CustodyHandle, AssetLedger, TransferErrorCode } from "./types.js";

export { TransferError, isValidHandle, isValidAmount } from "./types.js";

export { MemoryLedger } from "./memory-ledger.js";
