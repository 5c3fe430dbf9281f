export const TEMPERATURE_MIN = 0.1;
export const TEMPERATURE_MAX = 1.5;

const LAMBDA_MIN = Number.EPSILON;
const LAMBDA_MAX = 1 - Number.EPSILON;

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Sampling temperature for an agent with mutual influence `mu`.
 *
 * Decreases linearly with slope `alpha` from `t0` at mu = 0, so strongly
 * influenced agents answer more conservatively. Always inside
 * [TEMPERATURE_MIN, TEMPERATURE_MAX].
 */
export const temperatureFromMu = (mu: number, t0: number, alpha: number): number => {
  const raw = t0 - alpha * mu;
  if (Number.isNaN(raw)) {
    return TEMPERATURE_MIN;
  }
  return clamp(raw, TEMPERATURE_MIN, TEMPERATURE_MAX);
};

/**
 * Logistic gate centred at `tau`: 0.5 at mu = tau, towards 0 below and 1 above.
 * Weight of peer-influenced content against the agent's own prior.
 */
export const lambdaFromMu = (mu: number, k: number, tau: number): number => {
  const value = 1 / (1 + Math.exp(-k * (mu - tau)));
  if (Number.isNaN(value)) {
    return 0.5;
  }
  return clamp(value, LAMBDA_MIN, LAMBDA_MAX);
};
