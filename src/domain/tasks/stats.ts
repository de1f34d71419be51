export interface TaskStats {
  total: number;
  completed: number;
  pending: number;
  completionRate: number;
}

/**
 * Round to two decimals, ties to the even neighbour (0.125 -> 0.12).
 */
function roundHalfEven2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  if (fraction > 0.5) {
    return (floor + 1) / 100;
  }
  if (fraction < 0.5) {
    return floor / 100;
  }
  return (floor % 2 === 0 ? floor : floor + 1) / 100;
}

/**
 * Completion rate is a percentage rounded to two decimals, and 0 for an
 * empty set.
 */
export function computeStats(total: number, completed: number): TaskStats {
  const completionRate = total === 0 ? 0 : roundHalfEven2((completed / total) * 100);
  return {
    total,
    completed,
    pending: total - completed,
    completionRate,
  };
}
