import { toErrorMessage } from "../errors.js";
import { parseCitationFields } from "./citations.js";

export type SourceStatus = "valid" | "invalid" | "unverified";

export type SourceCheck = {
  url: string;
  status: SourceStatus;
  detail: string;
};

const PLACEHOLDER_PATTERNS: Array<[RegExp, string]> = [
  [/(?:^|[./])example\.(?:com|org|net)(?:[/:?#]|$)/i, "example domain"],
  [/X{5,}/, "placeholder characters"],
  [/placeholder/i, "placeholder text"],
  [/\/path\/to\//i, "template path"],
  [/\{[^}]*\}/, "unfilled template field"]
];

const GONE_STATUSES = new Set([404, 410]);

const LINK_RE = /\]\((https?:\/\/[^)\s]+)\)/;
const BARE_URL_RE = /https?:\/\/[^\s)\]]+/;

/**
 * The URL a citation definition points at, from the standard format or any link in it.
 */
export function definitionUrl(definition: string): string | null {
  const fields = parseCitationFields(definition);
  if (fields) return fields.url;
  return LINK_RE.exec(definition)?.[1] ?? BARE_URL_RE.exec(definition)?.[0] ?? null;
}

export function placeholderReason(url: string): string | null {
  for (const [re, reason] of PLACEHOLDER_PATTERNS) {
    if (re.test(url)) return reason;
  }
  return null;
}

/**
 * Checks one cited URL: placeholder patterns first, then a HEAD request. Only a 404 or 410
 * marks a reachable URL invalid; timeouts and other statuses leave it unverified.
 */
export async function checkSourceUrl(url: string, options: { signal: AbortSignal; timeoutMs: number }): Promise<SourceCheck> {
  const placeholder = placeholderReason(url);
  if (placeholder) return { url, status: "invalid", detail: placeholder };
  if (!/^https?:\/\//i.test(url)) return { url, status: "invalid", detail: "not an http(s) URL" };

  try {
    const res = await fetch(url, {
      method: "HEAD",
      redirect: "follow",
      signal: AbortSignal.any([options.signal, AbortSignal.timeout(options.timeoutMs)])
    });
    if (GONE_STATUSES.has(res.status)) return { url, status: "invalid", detail: `HTTP ${res.status}` };
    if (res.ok) return { url, status: "valid", detail: `HTTP ${res.status}` };
    return { url, status: "unverified", detail: `HTTP ${res.status}` };
  } catch (err) {
    if (options.signal.aborted) throw err;
    return { url, status: "unverified", detail: `request failed: ${toErrorMessage(err)}` };
  }
}
