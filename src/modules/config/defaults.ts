/**
 * Built-in default values for the Cadence configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → overrides
 */

import type {
  CadenceConfig,
  GlobalSettings,
  ReviewConfig,
  TriangulationConfig,
  MemoryConfig,
  IntentConfig,
  DispatchConfig,
  WorkersConfig,
} from './config-schema.js'

// ---------------------------------------------------------------------------
// Section defaults
// ---------------------------------------------------------------------------

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
  max_concurrent_namespaces: 8,
  data_dir: '.cadence',
}

export const DEFAULT_REVIEW_CONFIG: ReviewConfig = {
  max_retries: 2,
  pass_threshold: 0.7,
  gates: [
    { name: 'safety', viewpoints: ['security', 'correctness'] },
    { name: 'robustness', viewpoints: ['robustness', 'correctness'] },
    { name: 'resilience', viewpoints: ['resilience', 'maintainability'] },
    {
      name: 'final-critique',
      viewpoints: ['correctness', 'robustness', 'maintainability', 'alignment'],
    },
  ],
}

export const DEFAULT_TRIANGULATION_CONFIG: TriangulationConfig = {
  conflict_threshold: 0.3,
  viewpoint_timeout_ms: 5_000,
  timeout_weight_factor: 0.5,
  neutral_score: 0.5,
  domain_weights: {
    security: 1.5,
    correctness: 1.25,
    robustness: 1,
    resilience: 1,
    maintainability: 0.75,
    alignment: 1,
  },
}

export const DEFAULT_MEMORY_CONFIG: MemoryConfig = {
  top_k: 5,
  enhance_timeout_ms: 1_000,
  store_timeout_ms: 2_000,
  recency_half_life_days: 30,
  ema_alpha: 0.3,
  min_applicability: 0.05,
  retention: {
    max_age_days: 180,
    max_records: 10_000,
  },
  flush_base_delay_ms: 500,
  flush_max_delay_ms: 60_000,
}

export const DEFAULT_INTENT_CONFIG: IntentConfig = {
  stop_threshold: 0.6,
  goal_threshold: 0.3,
  max_modify_retries: 2,
}

export const DEFAULT_DISPATCH_CONFIG: DispatchConfig = {
  health_check_timeout_ms: 2_000,
  tier_order: ['memory-enhanced', 'basic'],
}

/**
 * Worker priority table. Every capability has a memory-enhanced variant that
 * depends on the pattern store and a basic variant with no dependencies.
 */
function capability(base: string): WorkersConfig['capabilities'][string] {
  return [
    { name: `${base}-memory-enhanced`, tier: 'memory-enhanced', dependencies: ['pattern-store'] },
    { name: base, tier: 'basic', dependencies: [] },
  ]
}

export const DEFAULT_WORKERS_CONFIG: WorkersConfig = {
  capabilities: {
    'goal-clarifier': capability('goal-clarifier'),
    'specification-writer': capability('specification-writer'),
    architect: capability('architect'),
    'pseudocode-writer': capability('pseudocode-writer'),
    implementer: capability('implementer'),
    'test-writer': capability('test-writer'),
    refiner: capability('refiner'),
    'completion-verifier': capability('completion-verifier'),
    'docs-writer': capability('docs-writer'),
  },
  phase_capabilities: {
    'goal-clarification': 'goal-clarifier',
    specification: 'specification-writer',
    architecture: 'architect',
    pseudocode: 'pseudocode-writer',
    implementation: 'implementer',
    'refinement-testing': 'test-writer',
    'refinement-implementation': 'refiner',
    completion: 'completion-verifier',
    documentation: 'docs-writer',
  },
}

// ---------------------------------------------------------------------------
// Full default config
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: CadenceConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  review: DEFAULT_REVIEW_CONFIG,
  triangulation: DEFAULT_TRIANGULATION_CONFIG,
  memory: DEFAULT_MEMORY_CONFIG,
  intent: DEFAULT_INTENT_CONFIG,
  dispatch: DEFAULT_DISPATCH_CONFIG,
  workers: DEFAULT_WORKERS_CONFIG,
}
