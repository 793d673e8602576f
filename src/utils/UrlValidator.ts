import { lookup } from 'dns/promises';
import { logger } from './logger';

/**
 * Validation result interface
 */
export interface ValidationResult {
  valid: boolean;
  error?: 'invalid_format' | 'bad_scheme' | 'empty_host' | 'typo' | 'dns' | 'ssl';
  reason?: string;
  host?: string;
}

export type ProbeOutcome =
  | { kind: 'reachable'; status: number }
  | { kind: 'blocked'; detail: string }
  | { kind: 'timeout' }
  | { kind: 'tls_failure'; detail: string };

export type HostResolver = (host: string) => Promise<void>;
export type ReachabilityProbe = (url: string, timeoutMs: number) => Promise<ProbeOutcome>;

export interface URLValidatorOptions {
  timeoutMs?: number;
  resolveHost?: HostResolver;
  probe?: ReachabilityProbe;
}

interface PlatformHint {
  fragment: string;
  name: string;
  domains: string[];
  suggestion: string;
}

// Near-miss catalogue for the platforms people paste most often
const PLATFORM_HINTS: PlatformHint[] = [
  {
    fragment: 'yout',
    name: 'youtube',
    domains: ['youtube.com', 'youtu.be', 'youtube-nocookie.com'],
    suggestion: "'youtube.com' or 'youtu.be'",
  },
  {
    fragment: 'instag',
    name: 'instagram',
    domains: ['instagram.com', 'instagr.am'],
    suggestion: "'instagram.com'",
  },
  {
    fragment: 'tikt',
    name: 'tiktok',
    domains: ['tiktok.com'],
    suggestion: "'tiktok.com'",
  },
  {
    fragment: 'faceb',
    name: 'facebook',
    domains: ['facebook.com', 'fb.watch', 'fb.com'],
    suggestion: "'facebook.com' or 'fb.watch'",
  },
  {
    fragment: 'twitt',
    name: 'twitter',
    domains: ['twitter.com', 'x.com'],
    suggestion: "'twitter.com' or 'x.com'",
  },
];

const TLS_CODE_PATTERN = /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_|SELF_SIGNED|DEPTH_ZERO|EPROTO$)/;

// Fixed OpenSSL/Node phrases only; messages also carry hostnames
const TLS_MESSAGE_PHRASES = [
  'secure tls connection',
  'certificate has expired',
  'self signed certificate',
  'self-signed certificate',
  'unable to verify the first certificate',
  'unable to get local issuer certificate',
  'wrong version number',
  'ssl routines',
];

function matchesDomain(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Cheap typo hints for hosts that look like a well-known platform but are not
 */
export function detectHostTypo(host: string): string | null {
  const h = host.toLowerCase();

  for (const hint of PLATFORM_HINTS) {
    if (hint.domains.some((domain) => matchesDomain(h, domain))) {
      return null;
    }
    if (h.includes(hint.fragment) && !h.includes(hint.name)) {
      return `Host looks like a typo. Did you mean ${hint.suggestion}? (got '${host}')`;
    }
  }

  return null;
}

/**
 * Walks an error and its `cause` chain looking for a TLS handshake/certificate failure
 */
export function isTlsFailure(error: unknown): boolean {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && current; depth++) {
    if (typeof current !== 'object') {
      return false;
    }
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string' && TLS_CODE_PATTERN.test(code)) {
      return true;
    }
    const message = 'message' in current ? current.message : undefined;
    if (typeof message === 'string') {
      const lower = message.toLowerCase();
      if (TLS_MESSAGE_PHRASES.some((phrase) => lower.includes(phrase))) {
        return true;
      }
    }
    current = 'cause' in current ? current.cause : undefined;
  }

  return false;
}

function errorDetail(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

function isTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

export const resolveWithDns: HostResolver = async (host) => {
  await lookup(host);
};

const LOOKUP_TIMED_OUT = Symbol('lookup timed out');

/**
 * Resolves to false when the lookup does not settle within `timeoutMs`
 */
async function resolveWithin(
  resolveHost: HostResolver,
  host: string,
  timeoutMs: number,
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<typeof LOOKUP_TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(LOOKUP_TIMED_OUT), timeoutMs);
  });

  try {
    const winner = await Promise.race([resolveHost(host), deadline]);
    return winner !== LOOKUP_TIMED_OUT;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Minimal ranged GET: asks for the first byte only
 */
export const httpRangeProbe: ReachabilityProbe = async (url, timeoutMs) => {
  try {
    const response = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      headers: {
        'User-Agent': 'Mozilla/5.0',
        Range: 'bytes=0-0',
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
    await response.body?.cancel();

    if (response.status >= 200 && response.status < 400) {
      return { kind: 'reachable', status: response.status };
    }
    return { kind: 'blocked', detail: `HTTP ${response.status}` };
  } catch (error) {
    if (isTimeout(error)) {
      return { kind: 'timeout' };
    }
    if (isTlsFailure(error)) {
      return { kind: 'tls_failure', detail: errorDetail(error) };
    }
    return { kind: 'blocked', detail: errorDetail(error) };
  }
};

/**
 * URLValidator - Fast pre-flight check before the engine is invoked.
 * Syntax, typo, DNS and a lightweight reachability probe; a blocked or
 * timed-out probe still counts as valid, a TLS failure does not.
 */
export class URLValidator {
  private readonly timeoutMs: number;
  private readonly resolveHost: HostResolver;
  private readonly probe: ReachabilityProbe;

  constructor(options: URLValidatorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.resolveHost = options.resolveHost ?? resolveWithDns;
    this.probe = options.probe ?? httpRangeProbe;
  }

  /**
   * Validates a normalized URL
   */
  async validate(url: string): Promise<ValidationResult> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return { valid: false, error: 'invalid_format', reason: 'URL parse failed.' };
    }

    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return {
        valid: false,
        error: 'bad_scheme',
        reason: 'URL must start with http:// or https://',
      };
    }

    const host = parsed.hostname.trim();
    if (!host) {
      return { valid: false, error: 'empty_host', reason: 'URL host is empty.' };
    }

    const typo = detectHostTypo(host);
    if (typo) {
      return { valid: false, error: 'typo', reason: typo, host };
    }

    let resolved: boolean;
    try {
      resolved = await resolveWithin(this.resolveHost, host, this.timeoutMs);
    } catch (error) {
      logger.debug('DNS lookup failed', { host, error: errorDetail(error) });
      return {
        valid: false,
        error: 'dns',
        reason: `Host does not resolve (DNS): '${host}'`,
        host,
      };
    }

    if (!resolved) {
      logger.debug('DNS lookup timed out, letting the engine decide', { host });
      return { valid: true, host };
    }

    let outcome: ProbeOutcome;
    try {
      outcome = await this.probe(url, this.timeoutMs);
    } catch (error) {
      outcome = { kind: 'blocked', detail: errorDetail(error) };
    }

    switch (outcome.kind) {
      case 'tls_failure':
        return { valid: false, error: 'ssl', reason: `SSL error: ${outcome.detail}`, host };
      case 'blocked':
        logger.debug('Reachability probe blocked, letting the engine decide', {
          url,
          detail: outcome.detail,
        });
        return { valid: true, host };
      case 'timeout':
        logger.debug('Reachability probe timed out, letting the engine decide', { url });
        return { valid: true, host };
      default:
        return { valid: true, host };
    }
  }
}
