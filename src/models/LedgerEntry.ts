import mongoose, { type InferSchemaType } from 'mongoose';

export const LEDGER_KINDS = ['deposit', 'collect', 'transfer'] as const;

export type LedgerKind = (typeof LEDGER_KINDS)[number];

export const LedgerEntrySchema = new mongoose.Schema(
  {
    // idempotency key of the movement
    txId: { type: String, required: true },

    kind: {
      type: String,
      required: true,
      enum: LEDGER_KINDS,
    },
    currency: { type: String, required: true, default: 'RUB' },

    // deposits have no debit side
    debitAccountId: {
      type: mongoose.Schema.Types.ObjectId,
      ref: 'Account',
      required: false,
      index: true,
    },
    creditAccountId: {
      type: mongoose.Schema.Types.ObjectId,
      ref: 'Account',
      required: true,
      index: true,
    },

    amount: { type: mongoose.Schema.Types.Decimal128, required: true },

    meta: { type: mongoose.Schema.Types.Mixed, required: false },
  },
  {
    timestamps: { createdAt: true, updatedAt: false },
    versionKey: false,
  }
);

LedgerEntrySchema.index({ txId: 1 }, { unique: true });

LedgerEntrySchema.index({ debitAccountId: 1, createdAt: -1 });
LedgerEntrySchema.index({ creditAccountId: 1, createdAt: -1 });

export type LedgerEntryDoc = InferSchemaType<typeof LedgerEntrySchema>;

export const LedgerEntryModel =
  (mongoose.models.LedgerEntry as mongoose.Model<LedgerEntryDoc>) ||
  mongoose.model<LedgerEntryDoc>('LedgerEntry', LedgerEntrySchema);
