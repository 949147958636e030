/**
 * TickScore — Scoring Configuration
 *
 * Every weight, threshold and bound the engine uses, as one immutable
 * value passed into each call. `createScoringConfig` validates and freezes;
 * `loadScoringConfig` reads TICKSCORE_* environment variables on top of the
 * defaults. Invalid configuration throws ConfigurationError, and only ever
 * at construction.
 */

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigurationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid scoring configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

// ---------------------------------------------------------------------------
// Shape
// ---------------------------------------------------------------------------

export interface ScoringConfig {
  /** Top of the output scale */
  maxScore: number;
  /** Upper bound on retained history per entity */
  maxHistory: number;
  /** Emit per-component debug logging */
  debug: boolean;

  /** Top-level weights, must sum to 1.0 */
  componentWeights: {
    infrastructure: number;
    participation: number;
    reliability: number;
  };

  infrastructure: {
    /** Sub-weights, must sum to 1.0 */
    weights: { tps: number; latency: number; memory: number };
    idealTps: number;
    /** At or below this the latency sub-score is 1.0 (seconds) */
    excellentLatencySeconds: number;
    /** At or above this the latency sub-score is 0 (seconds) */
    maxLatencySeconds: number;
    /** Free-memory ratio below which the memory sub-score decays faster */
    memoryHeadroomFloor: number;
  };

  participation: {
    /** Sub-weights, must sum to 1.0; registration 0 = untracked */
    weights: { compliance: number; players: number; registration: number };
    requiredPlugins: readonly string[];
    /** Compliance lost per missing required plugin */
    missingPluginPenalty: number;
    /** Multiplier on compliance when integrity failed or compliance is invalid */
    integrityComplianceMultiplier: number;
    /** Compliance sub-score below this counts as a compliance failure */
    compliancePassThreshold: number;
    /** Anti-whale cap on counted players */
    maxPlayersWeight: number;
    optimalUtilizationMin: number;
    optimalUtilizationMax: number;
    /** Utilization multiplier inside the optimal band */
    utilizationPeak: number;
    /** Utilization multiplier at empty and at full capacity */
    utilizationFloor: number;
  };

  reliability: {
    /** Sub-weights, must sum to 1.0 */
    weights: { uptime: number; stability: number; recovery: number };
    uptimeCapHours: number;
    /** Fewer reports than this only earns the uptime fallback */
    minReports: number;
    /** Penalty per uptime reset, scaled by how early it occurred */
    resetPenalty: number;
    /** Mean uptime hours gained per wall-clock hour needed for the growth bonus */
    growthBonusRate: number;
    /** Multiplier for the growth and stability bonuses */
    bonusMultiplier: number;
    /** Number of most recent reports the stability statistic covers */
    stabilityWindow: number;
    minStabilitySamples: number;
    /** Coefficient of variation at which stability reaches 0 */
    cvThreshold: number;
    /** Weighted mean TPS at or above this fraction of ideal earns the bonus */
    stabilityBonusFraction: number;
    /** TPS below this counts as a drop */
    tpsDropThreshold: number;
    recoveryFullCreditMinutes: number;
    recoveryMaxMinutes: number;
    /** Reports older than this are down-weighted (seconds) */
    freshnessCutoffSeconds: number;
  };

  penalties: {
    complianceCap: number;
    integrityCap: number;
    clockDriftMultiplier: number;
    signatureCap: number;
  };

  smoothing: {
    alpha: number;
    minChange: number;
    maxChange: number;
  };

  integrity: {
    maxClockDriftSeconds: number;
    allowUnsigned: boolean;
    /** Reports older than this are discarded before scoring (seconds) */
    reportMaxAgeSeconds: number;
  };
}

type SectionOverrides<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? Partial<T[K]> : T[K];
};

/** Overrides accepted by createScoringConfig, two levels deep */
export type ScoringConfigOverrides = {
  [K in keyof ScoringConfig]?: ScoringConfig[K] extends object
    ? SectionOverrides<ScoringConfig[K]>
    : ScoringConfig[K];
};

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_SCORING_CONFIG: ScoringConfig = deepFreeze({
  maxScore: 1000,
  maxHistory: 60,
  debug: false,

  componentWeights: {
    infrastructure: 0.4,
    participation: 0.35,
    reliability: 0.25,
  },

  infrastructure: {
    weights: { tps: 0.55, latency: 0.25, memory: 0.2 },
    idealTps: 20,
    excellentLatencySeconds: 0.1,
    maxLatencySeconds: 1.0,
    memoryHeadroomFloor: 0.1,
  },

  participation: {
    weights: { compliance: 0.55, players: 0.3, registration: 0.15 },
    requiredPlugins: ['Level114'],
    missingPluginPenalty: 1.0,
    integrityComplianceMultiplier: 0.3,
    compliancePassThreshold: 0.5,
    maxPlayersWeight: 200,
    optimalUtilizationMin: 0.2,
    optimalUtilizationMax: 0.8,
    utilizationPeak: 1.2,
    utilizationFloor: 0.6,
  },

  reliability: {
    weights: { uptime: 0.5, stability: 0.35, recovery: 0.15 },
    uptimeCapHours: 72,
    minReports: 5,
    resetPenalty: 0.3,
    growthBonusRate: 0.8,
    bonusMultiplier: 1.1,
    stabilityWindow: 20,
    minStabilitySamples: 3,
    cvThreshold: 0.3,
    stabilityBonusFraction: 0.9,
    tpsDropThreshold: 18,
    recoveryFullCreditMinutes: 30,
    recoveryMaxMinutes: 120,
    freshnessCutoffSeconds: 300,
  },

  penalties: {
    complianceCap: 0.3,
    integrityCap: 0.3,
    clockDriftMultiplier: 0.5,
    signatureCap: 0.1,
  },

  smoothing: {
    alpha: 0.2,
    minChange: 1,
    maxChange: 200,
  },

  integrity: {
    maxClockDriftSeconds: 15 * 60,
    allowUnsigned: false,
    reportMaxAgeSeconds: 6 * 60 * 60,
  },
});

/** Participation split for deployments that do not track registration */
export const UNTRACKED_PARTICIPATION_WEIGHTS = {
  compliance: 0.857,
  players: 0.143,
  registration: 0,
} as const;

const WEIGHT_TOLERANCE = 0.001;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Merge overrides onto the defaults, validate, and freeze.
 *
 * @throws ConfigurationError listing every problem found
 */
export function createScoringConfig(
  overrides: ScoringConfigOverrides = {},
  base: ScoringConfig = DEFAULT_SCORING_CONFIG,
): ScoringConfig {
  const config: ScoringConfig = {
    maxScore: overrides.maxScore ?? base.maxScore,
    maxHistory: overrides.maxHistory ?? base.maxHistory,
    debug: overrides.debug ?? base.debug,
    componentWeights: { ...base.componentWeights, ...overrides.componentWeights },
    infrastructure: {
      ...base.infrastructure,
      ...overrides.infrastructure,
      weights: { ...base.infrastructure.weights, ...overrides.infrastructure?.weights },
    },
    participation: {
      ...base.participation,
      ...overrides.participation,
      weights: { ...base.participation.weights, ...overrides.participation?.weights },
      requiredPlugins: [...(overrides.participation?.requiredPlugins ?? base.participation.requiredPlugins)],
    },
    reliability: {
      ...base.reliability,
      ...overrides.reliability,
      weights: { ...base.reliability.weights, ...overrides.reliability?.weights },
    },
    penalties: { ...base.penalties, ...overrides.penalties },
    smoothing: { ...base.smoothing, ...overrides.smoothing },
    integrity: { ...base.integrity, ...overrides.integrity },
  };

  const problems = validateScoringConfig(config);
  if (problems.length > 0) throw new ConfigurationError(problems);
  return deepFreeze(config);
}

/** Return every problem with a configuration; empty when valid */
export function validateScoringConfig(config: ScoringConfig): string[] {
  const problems: string[] = [];

  const checkWeights = (label: string, weights: Record<string, number>): void => {
    const values = Object.values(weights);
    if (values.some((w) => !Number.isFinite(w) || w < 0)) {
      problems.push(`${label} must be non-negative numbers`);
      return;
    }
    const sum = values.reduce((a, b) => a + b, 0);
    if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
      problems.push(`${label} must sum to 1.0 (got ${sum.toFixed(4)})`);
    }
  };

  const checkRange = (label: string, value: number, min: number, max: number): void => {
    if (!Number.isFinite(value) || value < min || value > max) {
      problems.push(`${label} must be within [${min}, ${max}] (got ${value})`);
    }
  };

  const checkPositive = (label: string, value: number): void => {
    if (!Number.isFinite(value) || value <= 0) {
      problems.push(`${label} must be positive (got ${value})`);
    }
  };

  const checkPositiveInteger = (label: string, value: number): void => {
    if (!Number.isInteger(value) || value <= 0) {
      problems.push(`${label} must be a positive integer (got ${value})`);
    }
  };

  checkPositiveInteger('maxScore', config.maxScore);
  checkPositiveInteger('maxHistory', config.maxHistory);

  checkWeights('componentWeights', config.componentWeights);
  checkWeights('infrastructure.weights', config.infrastructure.weights);
  checkWeights('participation.weights', config.participation.weights);
  checkWeights('reliability.weights', config.reliability.weights);

  const infra = config.infrastructure;
  checkPositive('infrastructure.idealTps', infra.idealTps);
  checkRange('infrastructure.excellentLatencySeconds', infra.excellentLatencySeconds, 0, Number.MAX_VALUE);
  if (!(infra.maxLatencySeconds > infra.excellentLatencySeconds)) {
    problems.push('infrastructure.maxLatencySeconds must exceed excellentLatencySeconds');
  }
  checkRange('infrastructure.memoryHeadroomFloor', infra.memoryHeadroomFloor, 0, 1);

  const part = config.participation;
  if (part.requiredPlugins.some((p) => p.trim().length === 0)) {
    problems.push('participation.requiredPlugins must not contain empty names');
  }
  checkRange('participation.missingPluginPenalty', part.missingPluginPenalty, 0, 1);
  checkRange('participation.integrityComplianceMultiplier', part.integrityComplianceMultiplier, 0, 1);
  checkRange('participation.compliancePassThreshold', part.compliancePassThreshold, 0, 1);
  checkPositive('participation.maxPlayersWeight', part.maxPlayersWeight);
  checkRange('participation.optimalUtilizationMin', part.optimalUtilizationMin, 0, 1);
  checkRange('participation.optimalUtilizationMax', part.optimalUtilizationMax, 0, 1);
  if (!(part.optimalUtilizationMin > 0 && part.optimalUtilizationMin < part.optimalUtilizationMax && part.optimalUtilizationMax < 1)) {
    problems.push('participation optimal utilization band must satisfy 0 < min < max < 1');
  }
  checkRange('participation.utilizationFloor', part.utilizationFloor, 0, part.utilizationPeak);
  checkPositive('participation.utilizationPeak', part.utilizationPeak);

  const rel = config.reliability;
  checkPositive('reliability.uptimeCapHours', rel.uptimeCapHours);
  checkPositiveInteger('reliability.minReports', rel.minReports);
  checkRange('reliability.resetPenalty', rel.resetPenalty, 0, 1);
  checkRange('reliability.growthBonusRate', rel.growthBonusRate, 0, Number.MAX_VALUE);
  checkRange('reliability.bonusMultiplier', rel.bonusMultiplier, 1, 2);
  checkPositiveInteger('reliability.stabilityWindow', rel.stabilityWindow);
  checkPositiveInteger('reliability.minStabilitySamples', rel.minStabilitySamples);
  checkPositive('reliability.cvThreshold', rel.cvThreshold);
  checkRange('reliability.stabilityBonusFraction', rel.stabilityBonusFraction, 0, 1);
  checkPositive('reliability.tpsDropThreshold', rel.tpsDropThreshold);
  checkRange('reliability.recoveryFullCreditMinutes', rel.recoveryFullCreditMinutes, 0, Number.MAX_VALUE);
  if (!(rel.recoveryMaxMinutes > rel.recoveryFullCreditMinutes)) {
    problems.push('reliability.recoveryMaxMinutes must exceed recoveryFullCreditMinutes');
  }
  checkPositive('reliability.freshnessCutoffSeconds', rel.freshnessCutoffSeconds);

  const pen = config.penalties;
  checkRange('penalties.complianceCap', pen.complianceCap, 0, 1);
  checkRange('penalties.integrityCap', pen.integrityCap, 0, 1);
  checkRange('penalties.clockDriftMultiplier', pen.clockDriftMultiplier, 0, 1);
  checkRange('penalties.signatureCap', pen.signatureCap, 0, 1);
  if (pen.signatureCap > pen.integrityCap) {
    problems.push('penalties.signatureCap must not exceed integrityCap');
  }

  const sm = config.smoothing;
  if (!(Number.isFinite(sm.alpha) && sm.alpha > 0 && sm.alpha <= 1)) {
    problems.push(`smoothing.alpha must be within (0, 1] (got ${sm.alpha})`);
  }
  checkRange('smoothing.minChange', sm.minChange, 0, config.maxScore);
  checkRange('smoothing.maxChange', sm.maxChange, sm.minChange, config.maxScore);

  const integ = config.integrity;
  checkPositive('integrity.maxClockDriftSeconds', integ.maxClockDriftSeconds);
  checkPositive('integrity.reportMaxAgeSeconds', integ.reportMaxAgeSeconds);

  return problems;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Build a configuration from TICKSCORE_* environment variables.
 * Unset variables keep their defaults; unparseable ones are reported
 * together with any validation problems.
 *
 * @throws ConfigurationError
 */
export function loadScoringConfig(env: Env = process.env): ScoringConfig {
  const problems: string[] = [];

  const num = (name: string): number | undefined => {
    const raw = env[`TICKSCORE_${name}`];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      problems.push(`TICKSCORE_${name} is not a number: "${raw}"`);
      return undefined;
    }
    return value;
  };

  const bool = (name: string): boolean | undefined => {
    const raw = env[`TICKSCORE_${name}`]?.trim().toLowerCase();
    if (raw === undefined || raw === '') return undefined;
    if (raw === 'true' || raw === '1' || raw === 'yes') return true;
    if (raw === 'false' || raw === '0' || raw === 'no') return false;
    problems.push(`TICKSCORE_${name} is not a boolean: "${raw}"`);
    return undefined;
  };

  const list = (name: string): string[] | undefined => {
    const raw = env[`TICKSCORE_${name}`];
    if (raw === undefined) return undefined;
    return raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  };

  const overrides: ScoringConfigOverrides = {
    maxScore: num('MAX_SCORE'),
    maxHistory: num('MAX_HISTORY'),
    debug: bool('DEBUG'),
    componentWeights: definedOnly({
      infrastructure: num('WEIGHT_INFRASTRUCTURE'),
      participation: num('WEIGHT_PARTICIPATION'),
      reliability: num('WEIGHT_RELIABILITY'),
    }),
    infrastructure: definedOnly({
      idealTps: num('IDEAL_TPS'),
      maxLatencySeconds: num('MAX_LATENCY_S'),
    }),
    participation: {
      ...definedOnly({
        maxPlayersWeight: num('MAX_PLAYERS_WEIGHT'),
        requiredPlugins: list('REQUIRED_PLUGINS'),
      }),
      weights: definedOnly({
        compliance: num('PARTICIPATION_COMPLIANCE'),
        players: num('PARTICIPATION_PLAYERS'),
        registration: num('PARTICIPATION_REGISTRATION'),
      }),
    },
    reliability: definedOnly({
      stabilityWindow: num('RELIABILITY_WINDOW'),
      freshnessCutoffSeconds: num('FRESHNESS_CUTOFF_S'),
    }),
    smoothing: definedOnly({
      alpha: num('EMA_ALPHA'),
      minChange: num('MIN_CHANGE'),
      maxChange: num('MAX_CHANGE'),
    }),
    integrity: definedOnly({
      maxClockDriftSeconds: num('MAX_CLOCK_DRIFT_S'),
      allowUnsigned: bool('ALLOW_UNSIGNED'),
      reportMaxAgeSeconds: num('REPORT_MAX_AGE_S'),
    }),
  };

  if (problems.length > 0) throw new ConfigurationError(problems);
  return createScoringConfig(overrides);
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

/** Flat summary of the active constants, for logs and GET /api/config */
export function describeConfig(config: ScoringConfig): Record<string, number | string | boolean> {
  const out: Record<string, number | string | boolean> = {};
  const walk = (prefix: string, value: unknown): void => {
    if (Array.isArray(value)) {
      out[prefix] = value.join(',');
    } else if (typeof value === 'object' && value !== null) {
      for (const [key, child] of Object.entries(value)) {
        walk(prefix ? `${prefix}.${key}` : key, child);
      }
    } else if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
      out[prefix] = value;
    }
  };
  walk('', config);
  return out;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Drop keys whose value is undefined so spreads keep the base value */
function definedOnly<T extends Record<string, unknown>>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in obj) {
    const value = obj[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
