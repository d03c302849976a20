/**
 * Zod schemas for the request and record types that cross the engine
 * boundary. Requests are parsed (never trusted) before any work starts;
 * session rows read back from storage go through the same schemas.
 */

import { z } from "zod";
import { CommitFsError } from "./errors.js";

// ---------------------------------------------------------------------------
// Shared field-level schemas
// ---------------------------------------------------------------------------

const UUID_V4_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const SessionIdSchema = z
  .string()
  .regex(UUID_V4_RE, "Must be a valid UUID v4");

const ISO8601_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{1,3})?Z$/;

const iso8601Utc = z
  .string()
  .regex(ISO8601_RE, "Must be ISO 8601 UTC datetime")
  .refine((s) => !isNaN(Date.parse(s)), "Must be a parseable datetime");

const branchName = z.string().min(1).max(255);

// ---------------------------------------------------------------------------
// Commit template
// ---------------------------------------------------------------------------

export const CommitTemplateSchema = z
  .object({
    subject: z.string().min(1).max(500),
    body: z.string().max(10_000).optional(),
    maxSubjectLength: z.number().int().positive().optional(),
  })
  .strict();

export type CommitTemplate = z.infer<typeof CommitTemplateSchema>;

// ---------------------------------------------------------------------------
// Write request
// ---------------------------------------------------------------------------

export const OperationSchema = z.enum(["add", "edit", "delete"]);
export type Operation = z.infer<typeof OperationSchema>;

export const UniquenessModeSchema = z.enum(["reject", "suffix", "off"]);
export type UniquenessMode = z.infer<typeof UniquenessModeSchema>;

/** Raw pattern lists as supplied at a call site (`!` marks deny entries). */
export const RawPatternListsSchema = z
  .object({
    allow: z.array(z.string()).optional(),
    deny: z.array(z.string()).optional(),
  })
  .strict();

export type RawPatternLists = z.infer<typeof RawPatternListsSchema>;

const ContentSchema = z.union([z.string(), z.instanceof(Uint8Array)]);

export const WriteRequestSchema = z
  .object({
    path: z.string().min(1).max(4096),
    content: ContentSchema.optional(),
    op: OperationSchema,
    summary: z.string().max(500),
    reason: z.string().max(2000).optional(),
    authorization: RawPatternListsSchema.optional(),
    uniqueness: UniquenessModeSchema.optional(),
    allowDirty: z.boolean().optional(),
    template: CommitTemplateSchema.optional(),
  })
  .strict()
  .superRefine((req, ctx) => {
    if (req.op !== "delete" && req.content === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["content"],
        message: `content is required for op "${req.op}"`,
      });
    }
  });

export type WriteRequest = z.infer<typeof WriteRequestSchema>;

// ---------------------------------------------------------------------------
// Staged sessions
// ---------------------------------------------------------------------------

export const SessionStatusSchema = z.enum([
  "OPEN",
  "PREVIEWED",
  "FINALIZED",
  "ABORTED",
]);
export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const FinalizeStrategySchema = z.enum([
  "merge",
  "merge-ff",
  "rebase-merge",
  "squash",
]);
export type FinalizeStrategy = z.infer<typeof FinalizeStrategySchema>;

export const FinalizeOptionsSchema = z
  .object({
    strategy: FinalizeStrategySchema,
    targetBranch: branchName.optional(),
  })
  .strict();

export type FinalizeOptions = z.infer<typeof FinalizeOptionsSchema>;

export const TicketSchema = z.string().min(1).max(200);

export const StagedSessionSchema = z
  .object({
    sessionId: SessionIdSchema,
    repoRoot: z.string().min(1),
    baseBranch: branchName,
    baseTip: z.string().min(1),
    workBranch: branchName,
    ticket: TicketSchema.optional(),
    status: SessionStatusSchema,
    createdAt: iso8601Utc,
    updatedAt: iso8601Utc,
    closedAt: iso8601Utc.optional(),
    mergedCommitId: z.string().optional(),
    strategy: FinalizeStrategySchema.optional(),
  })
  .strict();

export type StagedSession = z.infer<typeof StagedSessionSchema>;

// ---------------------------------------------------------------------------
// Parsing helper
// ---------------------------------------------------------------------------

/**
 * Parse `input` with `schema`, failing INVALID_REQUEST with the zod issues
 * in `details.issues`.
 */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new CommitFsError(
      `Invalid ${what}: ${result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`,
      "INVALID_REQUEST",
      { issues: result.error.issues },
    );
  }
  return result.data;
}
