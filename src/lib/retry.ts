export type RetryOptions = {
  retries: number;
  delaysMs: number[];
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; error: unknown; delayMs: number }) => void;
};

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function retryAsync<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { retries, delaysMs, shouldRetry, onRetry } = options;
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      attempt += 1;
      const canRetry = attempt <= retries && shouldRetry(err);
      if (!canRetry) throw err;
      const delayMs = delaysMs[Math.min(attempt - 1, delaysMs.length - 1)] ?? 0;
      if (onRetry) onRetry({ attempt, error: err, delayMs });
      if (delayMs > 0) await sleep(delayMs);
    }
  }
}

type ErrorLike = { status?: unknown; message?: unknown };

function readErrorLike(err: unknown): ErrorLike | null {
  if (!err || typeof err !== "object") return null;
  const status = "status" in err ? err.status : undefined;
  const message = "message" in err ? err.message : undefined;
  return { status, message };
}

const TRANSIENT_MARKERS = [
  "timeout",
  "timed out",
  "network",
  "fetch failed",
  "econnreset",
  "econnrefused",
  "statement timeout",
];

export function isTransientDataError(err: unknown): boolean {
  const info = readErrorLike(err);
  if (!info) return false;
  if (typeof info.status === "number" && info.status >= 500) return true;
  const msg = String(info.message ?? "").toLowerCase();
  return TRANSIENT_MARKERS.some((marker) => msg.includes(marker));
}

export function formatRetryError(err: unknown): string {
  const info = readErrorLike(err);
  if (!info) return String(err);
  const status = typeof info.status === "number" ? `status ${info.status}` : "";
  const message = info.message ? String(info.message) : "";
  return [status, message].filter(Boolean).join(" ").trim() || "unknown error";
}
