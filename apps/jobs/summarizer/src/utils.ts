export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** The deadline covers reading the body, not just the headers. */
export function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  return fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
}

export function truncate(text: string, max: number, suffix = "..."): string {
  return text.length > max ? `${text.slice(0, max)}${suffix}` : text;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Truncates to `target` entries, then pads with `fill(index)`. */
export function fitToLength(
  lines: string[],
  target: number,
  fill: (index: number) => string
): string[] {
  const out = lines.slice(0, target);
  while (out.length < target) out.push(fill(out.length));
  return out;
}
