/**
 * Zod validation schemas for the Cadence configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - review chain and triangulation tuning
 *  - memory (pattern store) tuning and retention
 *  - intent thresholds
 *  - dispatch and the worker priority table
 *  - full config document
 */

import { z } from 'zod'
import { PHASE_SEQUENCE } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Namespaces whose signals may be processed at the same time */
    max_concurrent_namespaces: z.number().int().min(1).max(256),
    /** Directory for the SQLite database and the local fallback queue */
    data_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Review chain
// ---------------------------------------------------------------------------

export const ViewpointNameSchema = z.string().min(1)

export const ReviewGateConfigSchema = z
  .object({
    name: z.string().min(1),
    viewpoints: z.array(ViewpointNameSchema).min(1),
  })
  .strict()

export type ReviewGateConfig = z.infer<typeof ReviewGateConfigSchema>

export const ReviewConfigSchema = z
  .object({
    /** Failed attempts on one gate before escalation */
    max_retries: z.number().int().min(1).max(10),
    /** Consensus score a gate needs to pass */
    pass_threshold: z.number().min(0).max(1),
    /** Ordered gate list */
    gates: z.array(ReviewGateConfigSchema).min(1),
  })
  .strict()

export type ReviewConfig = z.infer<typeof ReviewConfigSchema>

// ---------------------------------------------------------------------------
// Triangulation
// ---------------------------------------------------------------------------

export const TriangulationConfigSchema = z
  .object({
    /** Score gap above which two disagreeing viewpoints count as a conflict */
    conflict_threshold: z.number().min(0).max(1),
    viewpoint_timeout_ms: z.number().int().positive(),
    /** Weight multiplier applied to a timed-out viewpoint */
    timeout_weight_factor: z.number().min(0).max(1),
    /** Score contributed by a timed-out viewpoint */
    neutral_score: z.number().min(0).max(1),
    /** Domain priority weight per viewpoint (missing → 1) */
    domain_weights: z.record(z.string(), z.number().positive()),
  })
  .strict()

export type TriangulationConfig = z.infer<typeof TriangulationConfigSchema>

// ---------------------------------------------------------------------------
// Memory
// ---------------------------------------------------------------------------

export const RetentionPolicySchema = z
  .object({
    /** Records not updated for this many days are pruned (0 = no age limit) */
    max_age_days: z.number().int().min(0),
    /** Keep at most this many records, dropping the least recently updated (0 = no cap) */
    max_records: z.number().int().min(0),
  })
  .strict()

export type RetentionPolicyConfig = z.infer<typeof RetentionPolicySchema>

export const MemoryConfigSchema = z
  .object({
    top_k: z.number().int().min(1).max(100),
    enhance_timeout_ms: z.number().int().positive(),
    /** Per-call timeout of the primary pattern store */
    store_timeout_ms: z.number().int().positive(),
    recency_half_life_days: z.number().positive(),
    /** Smoothing factor of the confidence moving average */
    ema_alpha: z.number().gt(0).max(1),
    /** Records below this applicability are left out of a boost */
    min_applicability: z.number().min(0).max(1),
    retention: RetentionPolicySchema,
    flush_base_delay_ms: z.number().int().positive(),
    flush_max_delay_ms: z.number().int().positive(),
    /** Directory of the local fallback queue (default: <data_dir>/fallback) */
    fallback_dir: z.string().optional(),
  })
  .strict()

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>

// ---------------------------------------------------------------------------
// Intent
// ---------------------------------------------------------------------------

export const IntentConfigSchema = z
  .object({
    /** Anti-goal coverage at or above which an action is stopped */
    stop_threshold: z.number().gt(0).max(1),
    /** Goal alignment below which an action is sent back for modification */
    goal_threshold: z.number().min(0).max(1),
    /** MODIFY verdicts in one phase before escalation */
    max_modify_retries: z.number().int().min(1).max(10),
  })
  .strict()

export type IntentConfig = z.infer<typeof IntentConfigSchema>

// ---------------------------------------------------------------------------
// Dispatch and worker priority table
// ---------------------------------------------------------------------------

export const PhaseSchema = z.enum(PHASE_SEQUENCE)

export const WorkerVariantSchema = z
  .object({
    name: z.string().min(1),
    tier: z.string().min(1),
    /** External services that must be healthy for this variant to be picked */
    dependencies: z.array(z.string().min(1)),
  })
  .strict()

export type WorkerVariantConfig = z.infer<typeof WorkerVariantSchema>

export const WorkersConfigSchema = z
  .object({
    /** capability → registered implementations */
    capabilities: z.record(z.string(), z.array(WorkerVariantSchema).min(1)),
    /** phase → capability that performs it */
    phase_capabilities: z.record(PhaseSchema, z.string().min(1)),
  })
  .strict()

export type WorkersConfig = z.infer<typeof WorkersConfigSchema>

export const DispatchConfigSchema = z
  .object({
    health_check_timeout_ms: z.number().int().positive(),
    /** Tiers from most to least preferred */
    tier_order: z.array(z.string().min(1)).min(1),
  })
  .strict()

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const CadenceConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    review: ReviewConfigSchema,
    triangulation: TriangulationConfigSchema,
    memory: MemoryConfigSchema,
    intent: IntentConfigSchema,
    dispatch: DispatchConfigSchema,
    workers: WorkersConfigSchema,
  })
  .strict()

export type CadenceConfig = z.infer<typeof CadenceConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (allowed in files, env and overrides before merging)
// ---------------------------------------------------------------------------

export const PartialCadenceConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    review: ReviewConfigSchema.partial().optional(),
    triangulation: TriangulationConfigSchema.partial().optional(),
    memory: MemoryConfigSchema.extend({ retention: RetentionPolicySchema.partial() })
      .partial()
      .optional(),
    intent: IntentConfigSchema.partial().optional(),
    dispatch: DispatchConfigSchema.partial().optional(),
    workers: WorkersConfigSchema.partial().optional(),
  })
  .strict()

export type PartialCadenceConfig = z.infer<typeof PartialCadenceConfigSchema>
