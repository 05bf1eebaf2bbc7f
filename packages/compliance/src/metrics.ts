import type { DerivedMetrics, MaterialFraction, ProductDeclaration } from "@concrete-screen/core";

// "agua" covers declarations published in Spanish.
const WATER_MARKERS = ["water", "agua"] as const;
const CEMENT_MARKERS = ["cement", "cem "] as const;

export interface CompositionTotals {
  readonly water: number;
  readonly cement: number;
}

function matches(name: string, markers: readonly string[]): boolean {
  return markers.some((marker) => name.includes(marker));
}

/** Mass percentages of water and cement; an entry counts towards at most one of them. */
export function sumComposition(fractions: readonly MaterialFraction[]): CompositionTotals {
  let water = 0;
  let cement = 0;
  for (const fraction of fractions) {
    const name = fraction.name.toLowerCase();
    const percentage = Number.isFinite(fraction.percentage) ? fraction.percentage : 0;
    if (matches(name, WATER_MARKERS)) {
      water += percentage;
    } else if (matches(name, CEMENT_MARKERS)) {
      cement += percentage;
    }
  }
  return { water, cement };
}

export function deriveMetrics(declaration: ProductDeclaration): DerivedMetrics {
  const { water, cement } = sumComposition(declaration.mat_comp);
  const density = declaration.density;
  const hasCement = cement > 0;
  let cementContent: number | null = null;
  if (hasCement && density !== null && Number.isFinite(density) && density > 0) {
    // multiply before dividing so whole-number inputs stay exact
    cementContent = (cement * density) / 100;
  }

  return {
    calculated_wc: hasCement ? water / cement : null,
    cement_content_kg_m3: cementContent,
    strength_mpa: declaration.MPa,
    max_aggregate_size: declaration.max_aggregate_size,
  };
}
