export const Quadrant = {
  DoNow: 'Q1',
  Schedule: 'Q2',
  Delegate: 'Q3',
  Eliminate: 'Q4',
} as const;

export type Quadrant = (typeof Quadrant)[keyof typeof Quadrant];

export const QuadrantName: Record<Quadrant, string> = {
  [Quadrant.DoNow]: 'Do now',
  [Quadrant.Schedule]: 'Schedule',
  [Quadrant.Delegate]: 'Delegate',
  [Quadrant.Eliminate]: 'Eliminate',
};

/** Emission order for grouped listings */
export const QUADRANT_ORDER: readonly Quadrant[] = [
  Quadrant.DoNow,
  Quadrant.Schedule,
  Quadrant.Delegate,
  Quadrant.Eliminate,
];

/** Eisenhower classification: pure function of the two flags */
export function classify(urgent: boolean, important: boolean): Quadrant {
  if (important) return urgent ? Quadrant.DoNow : Quadrant.Schedule;
  return urgent ? Quadrant.Delegate : Quadrant.Eliminate;
}

/** Inverse of classify */
export function quadrantFlags(quadrant: Quadrant): { urgent: boolean; important: boolean } {
  switch (quadrant) {
    case Quadrant.DoNow: return { urgent: true, important: true };
    case Quadrant.Schedule: return { urgent: false, important: true };
    case Quadrant.Delegate: return { urgent: true, important: false };
    case Quadrant.Eliminate: return { urgent: false, important: false };
  }
}

/**
 * Parse a quadrant from its code ("Q1", "q1") or its label in
 * kebab form ("do-now", "schedule", "delegate", "eliminate").
 * Returns null for anything else.
 */
export function parseQuadrant(input: string): Quadrant | null {
  const normalized = input.trim().toLowerCase().replace(/[\s_]+/g, '-');
  switch (normalized) {
    case 'q1': case 'do-now': case 'do': return Quadrant.DoNow;
    case 'q2': case 'schedule': return Quadrant.Schedule;
    case 'q3': case 'delegate': return Quadrant.Delegate;
    case 'q4': case 'eliminate': return Quadrant.Eliminate;
    default: return null;
  }
}

export function isQuadrant(value: unknown): value is Quadrant {
  return typeof value === 'string' && QUADRANT_ORDER.some(q => q === value);
}
