/**
 * Pure worker-variant selection.
 *
 * Variants are ranked by the position of their tier in `tierOrder` (tiers
 * missing from the order rank last), then by registration order. The first
 * variant whose dependencies are all healthy wins. A dependency missing from
 * the health snapshot counts as unhealthy.
 */

import type { HealthSnapshot, SkippedVariant, VariantSelection, WorkerVariant } from './types.js'

function tierRank(tier: string, tierOrder: readonly string[]): number {
  const index = tierOrder.indexOf(tier)
  return index === -1 ? tierOrder.length : index
}

/** Variants in preference order */
export function rankVariants(variants: readonly WorkerVariant[], tierOrder: readonly string[]): WorkerVariant[] {
  return variants
    .map((variant, position) => ({ variant, position, rank: tierRank(variant.tier, tierOrder) }))
    .sort((a, b) => a.rank - b.rank || a.position - b.position)
    .map((entry) => entry.variant)
}

export function selectVariant(
  variants: readonly WorkerVariant[],
  health: HealthSnapshot,
  tierOrder: readonly string[],
): VariantSelection | null {
  const skipped: SkippedVariant[] = []
  for (const variant of rankVariants(variants, tierOrder)) {
    const unhealthy = variant.dependencies.filter((dep) => health.get(dep) !== true)
    if (unhealthy.length === 0) {
      return { variant, skipped }
    }
    skipped.push({ name: variant.name, tier: variant.tier, unhealthy })
  }
  return null
}

/** Human-readable account of a selection */
export function describeSelection(selection: VariantSelection): string {
  const parts = selection.skipped.map((s) => `${s.name} skipped (unhealthy: ${s.unhealthy.join(', ')})`)
  parts.push(`selected ${selection.variant.name} (${selection.variant.tier})`)
  return parts.join('; ')
}
