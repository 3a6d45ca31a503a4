import type { TimeWindow } from '@/types/media';

const UNKNOWN_DURATION_SEC = 7200;

interface SamplePlan {
  sampleSec: number;
  percentSets: number[][];
}

const LONG_PLAN: SamplePlan = {
  sampleSec: 90,
  percentSets: [
    [15, 25, 35, 50, 65],
    [8, 20, 45, 75, 88],
    [12, 40, 60, 80, 90]
  ]
};

const MEDIUM_PLAN: SamplePlan = {
  sampleSec: 75,
  percentSets: [
    [15, 30, 50, 70],
    [8, 40, 65, 85],
    [25, 45, 75, 90]
  ]
};

const SHORT_PLAN: SamplePlan = {
  sampleSec: 60,
  percentSets: [
    [20, 50, 80],
    [10, 35, 75],
    [30, 60, 90]
  ]
};

function selectPlan(durationSec: number): SamplePlan {
  if (durationSec > 3600) {
    return LONG_PLAN;
  }
  if (durationSec > 1800) {
    return MEDIUM_PLAN;
  }
  return SHORT_PLAN;
}

/**
 * Sample windows for one retry. Each retry uses a different percentage set so
 * later attempts land away from the silence or credits an earlier one hit.
 * Starts stay between the larger of 60 s / 5 % and 85 % of the runtime.
 */
export function planSampleWindows(durationSec: number, retry: number): TimeWindow[] {
  const duration = Number.isFinite(durationSec) && durationSec > 0 ? durationSec : UNKNOWN_DURATION_SEC;
  const plan = selectPlan(duration);
  const percents = plan.percentSets[retry % plan.percentSets.length] ?? [];
  const minStart = Math.max(60, duration * 0.05);
  const maxStart = duration * 0.85;

  return percents.map((percent) => ({
    startSec: Math.max(minStart, Math.min(maxStart, (duration * percent) / 100)),
    durationSec: plan.sampleSec
  }));
}
