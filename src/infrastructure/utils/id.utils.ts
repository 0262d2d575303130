/** Filesystem-safe id for one server session, e.g. `SESSION_20261019T081500_k3x9`. */
export function sessionId(now: Date = new Date()) {
  const pad = (n: number) => String(n).padStart(2, "0");
  const base =
    now.getFullYear() +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    "T" +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds());
  const rand = Math.random().toString(36).slice(2, 6);
  return "SESSION_" + base + "_" + rand;
}
