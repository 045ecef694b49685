export { AccountModel, AccountSchema, type AccountDoc, type AccountStatus } from './Account';
export { LedgerEntryModel, LedgerEntrySchema, LEDGER_KINDS, type LedgerEntryDoc, type LedgerKind } from './LedgerEntry';
