// Centralized runtime defaults for concurrency, timeouts and the HTTP client.
// Values are read from env with sane defaults and can be overridden per run.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const CONFIG = {
  CONCURRENCY_DEFAULT: envInt('SUBSIFT_CONCURRENCY', 200),
  TIMEOUT_SECONDS_DEFAULT: envInt('SUBSIFT_TIMEOUT', 15),

  USER_AGENT: process.env.SUBSIFT_USER_AGENT || 'subsift/0.1',
};

export default CONFIG;
