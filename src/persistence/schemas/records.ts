/**
 * Zod schemas for engine persistence records.
 *
 * Query functions validate their inputs with these schemas before any
 * statement runs, so malformed rows never reach the database.
 */

import { z } from 'zod'
import { PHASE_SEQUENCE } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const PhaseEnum = z.enum(PHASE_SEQUENCE)
export const ProjectStatusEnum = z.enum(['active', 'paused', 'completed', 'cancelled'])
export const TaskStatusEnum = z.enum(['pending', 'in-progress', 'completed', 'failed'])
export const IntentKindEnum = z.enum(['goal', 'anti-goal', 'constraint'])
export const IntentSourceEnum = z.enum(['explicit', 'inferred', 'custom-answer'])
export const EscalationKindEnum = z.enum(['gate', 'intent'])
export const EscalationStatusEnum = z.enum(['open', 'approved', 'rejected'])
export const InstructionKindEnum = z.enum(['work', 'remediation'])

const NamespaceSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'namespace may contain letters, digits, ".", "_" and "-"')

// ---------------------------------------------------------------------------
// Completion signal (consumed from the external executor)
// ---------------------------------------------------------------------------

export const CompletionSignalSchema = z.object({
  namespace: NamespaceSchema,
  phase: PhaseEnum,
  workerName: z.string().min(1),
  artifactRefs: z.array(z.string().min(1)).min(1),
  timestamp: z.string().datetime({ offset: true }),
  signalId: z.string().min(1),
  success: z.boolean().optional(),
  summary: z.string().optional(),
  kind: InstructionKindEnum.optional(),
})
export type CompletionSignalInput = z.infer<typeof CompletionSignalSchema>

// ---------------------------------------------------------------------------
// Projects and tasks
// ---------------------------------------------------------------------------

export const CreateProjectInputSchema = z.object({
  namespace: NamespaceSchema,
  goal: z.string().trim().min(1),
})
export type CreateProjectInput = z.infer<typeof CreateProjectInputSchema>

export const CreateTaskInputSchema = z.object({
  namespace: NamespaceSchema,
  phase: PhaseEnum,
  workerName: z.string().min(1),
  status: TaskStatusEnum.default('pending'),
  dependencies: z.array(z.string().min(1)).default([]),
})
export type CreateTaskInput = z.input<typeof CreateTaskInputSchema>

// ---------------------------------------------------------------------------
// Review audit
// ---------------------------------------------------------------------------

export const ViewpointOutcomeSchema = z.object({
  viewpoint: z.string().min(1),
  score: z.number().min(0).max(1),
  issues: z.array(z.string()),
  weight: z.number().min(0),
  passed: z.boolean(),
  timedOut: z.boolean(),
})

export const ViewpointConflictSchema = z.object({
  viewpoints: z.tuple([z.string(), z.string()]),
  scoreGap: z.number(),
  resolved: z.boolean(),
  reason: z.string(),
})

export const TriangulationRecordInputSchema = z.object({
  namespace: z.string().min(1),
  artifactRef: z.string().min(1),
  phase: PhaseEnum,
  consensusScore: z.number().min(0).max(1),
  passed: z.boolean(),
  viewpoints: z.array(ViewpointOutcomeSchema),
  conflicts: z.array(ViewpointConflictSchema),
})
export type TriangulationRecordInput = z.infer<typeof TriangulationRecordInputSchema>

export const GateResultInputSchema = z.object({
  namespace: z.string().min(1),
  phase: PhaseEnum,
  gateName: z.string().min(1),
  artifactRef: z.string().min(1),
  passed: z.boolean(),
  score: z.number().min(0).max(1),
  issues: z.array(z.string()),
  retryCount: z.number().int().min(0),
  triangulationId: z.string().nullable(),
})
export type GateResultInput = z.infer<typeof GateResultInputSchema>

// ---------------------------------------------------------------------------
// Intent
// ---------------------------------------------------------------------------

export const IntentEntryInputSchema = z.object({
  kind: IntentKindEnum,
  text: z.string().trim().min(1),
  source: IntentSourceEnum,
  confidence: z.number().min(0).max(1).optional(),
})
export type IntentEntryInput = z.infer<typeof IntentEntryInputSchema>

// ---------------------------------------------------------------------------
// Escalations and instructions
// ---------------------------------------------------------------------------

export const CreateEscalationInputSchema = z.object({
  namespace: z.string().min(1),
  phase: PhaseEnum,
  kind: EscalationKindEnum,
  gateName: z.string().nullable().default(null),
  reason: z.string().min(1),
})
export type CreateEscalationInput = z.input<typeof CreateEscalationInputSchema>
