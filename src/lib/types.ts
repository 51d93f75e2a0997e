import { z } from "zod";

// Entities
export const entitySchema = z
  .object({
    id: z.string().min(1),
  })
  .passthrough();

export type Entity = { id: string } & Record<string, unknown>;

// What the UI asks for; `update` entities may be partial beyond `id`
export type WriteIntent =
  | { operation: "create"; collection: string; entity: Entity }
  | { operation: "update"; collection: string; entity: Entity }
  | { operation: "delete"; collection: string; id: string };

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be formatted as YYYY-MM-DD");

export const expenseSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1).max(500),
  amount: z.number().positive(),
  category: z.string().min(1),
  type: z.string().min(1),
  date: isoDate,
  note: z.string().nullable().optional(),
});

export type Expense = z.infer<typeof expenseSchema>;

export const recurringFrequencySchema = z.enum([
  "daily",
  "weekly",
  "monthly",
  "yearly",
]);

export const recurringExpenseSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1).max(500),
  amount: z.number().positive(),
  category: z.string().min(1),
  type: z.string().min(1),
  frequency: recurringFrequencySchema,
  startDate: isoDate,
  endDate: isoDate.nullable(),
  isActive: z.boolean(),
});

export type RecurringExpense = z.infer<typeof recurringExpenseSchema>;

export const EXPENSES_COLLECTION = "expenses";
export const RECURRING_EXPENSES_COLLECTION = "recurring_expenses";

// Queue records
export const operationTypeSchema = z.enum(["create", "update", "delete"]);
export type OperationType = z.infer<typeof operationTypeSchema>;

export const queuedWriteStatusSchema = z.enum(["pending", "syncing", "failed"]);
export type QueuedWriteStatus = z.infer<typeof queuedWriteStatusSchema>;

export const remoteErrorKindSchema = z.enum(["transient", "permanent"]);
export type RemoteErrorKind = z.infer<typeof remoteErrorKindSchema>;

export const writeRequestSchema = z.object({
  operationType: operationTypeSchema,
  targetCollection: z.string().min(1),
  entityId: z.string().min(1),
  payload: z.record(z.unknown()),
});

export type WriteRequest = z.infer<typeof writeRequestSchema>;

export const queuedWriteRecordSchema = writeRequestSchema.extend({
  id: z.string().min(1),
  batchId: z.string().nullable(),
  enqueuedAt: z.string(),
  attemptCount: z.number().int().min(0),
  lastError: z.string().nullable(),
  lastErrorKind: remoteErrorKindSchema.nullable(),
  lastAttemptAt: z.string().nullable(),
  nextAttemptAt: z.string().nullable(),
  status: queuedWriteStatusSchema,
});

export type QueuedWriteRecord = z.infer<typeof queuedWriteRecordSchema>;

// Aggregate sync state
export type SyncPhase = "idle" | "pending" | "syncing" | "synced" | "error";

export interface SyncState {
  phase: SyncPhase;
  pendingCount: number;
  failedCount: number;
  lastSyncedAt: string | null;
  lastError: string | null;
}
