// Diagnostics and test harness knobs come from the process environment.
export type Env = Record<string, string | undefined>;

const processEnv = (): Env => (typeof process !== 'undefined' && process.env ? process.env : {});

// '1' or 'true' (any case) turns a flag on
export const envFlag = (name: string, env: Env = processEnv()): boolean => {
  const v = (env[name] ?? '').toLowerCase();
  return v === '1' || v === 'true';
};

export const envString = (name: string, fallback: string, env: Env = processEnv()): string => {
  const v = env[name];
  return v !== undefined && v.length > 0 ? v : fallback;
};

// Positive integers only; anything else yields the fallback
export const envNumber = (name: string, fallback: number, env: Env = processEnv()): number => {
  const raw = env[name];
  if (raw === undefined || raw.length === 0) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
};
