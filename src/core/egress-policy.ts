/**
 * Egress Policy - SSRF, DNS-rebinding and redirect protection
 *
 * One predicate decides whether a URL may be contacted. It is used by every
 * transport, by the validator, and by the browser navigation guard. Blocks:
 * - Non-http(s) schemes, control characters, embedded credentials
 * - IP literals in non-canonical encodings (integer, octal, hex, short forms)
 * - Private, loopback, link-local and other non-public addresses, including
 *   IPv4-mapped IPv6 and DNS answers that contain any such address
 * - Ports outside the allowed set and known internal hostnames
 *
 * A request attempt runs inside an EgressChain that pins the resolved
 * addresses per host, so a host cannot re-resolve to a different address
 * between validation and connection or between redirect hops.
 */

import { RecipeError } from '../types/errors.js';
import { classifyAddress, looksLikeNumericHost, parseIPv4, type AddressClass } from '../utils/ip-address.js';
import { logger } from '../utils/logger.js';
import { redactUrl } from '../utils/redaction.js';
import { CachingResolver, type HostResolver, type ResolvedAddress } from './dns-resolver.js';

const log = logger.egress;

export interface EgressConfig {
  allowedPorts: number[];
  maxRedirects: number;
  /** Allow a redirect to switch between http and https */
  allowSchemeChange: boolean;
  /** Additional blocked hostnames (exact, lowercase) */
  blockedHostnames: string[];
  dnsCacheTtlMs: number;
  dnsCacheSize: number;
}

export const DEFAULT_EGRESS_CONFIG: EgressConfig = {
  allowedPorts: [80, 443, 8080, 8443],
  maxRedirects: 5,
  allowSchemeChange: false,
  blockedHostnames: [],
  dnsCacheTtlMs: 30000,
  dnsCacheSize: 512,
};

export type DenialReason =
  | 'invalid_url'
  | 'scheme'
  | 'control_characters'
  | 'credentials'
  | 'non_canonical_ip'
  | 'blocked_hostname'
  | 'port'
  | 'private_address'
  | 'dns_failure'
  | 'redirect_limit'
  | 'scheme_change'
  | 'redirect_disabled'
  | 'domain_not_allowed';

export type EgressVerdict =
  | { allowed: true; url: URL; host: string; port: number }
  | { allowed: false; reason: DenialReason; detail: string };

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Well-known internal and cloud metadata names
 */
const BLOCKED_HOSTNAMES = new Set([
  'localhost',
  'localhost.localdomain',
  'ip6-localhost',
  'ip6-loopback',
  'instance-data',
  'metadata',
  'metadata.google.internal',
  'metadata.gke.io',
  'metadata.azure.internal',
]);

const BLOCKED_SUFFIXES = ['.localhost', '.local', '.internal', '.localdomain', '.home.arpa'];

// Whitespace, C0 controls, DEL, and backslash which special-scheme parsing treats as '/'
const UNSAFE_CHARACTERS = /[\u0000- \u007f\\]/;

const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:/i;

function deny(reason: DenialReason, detail: string): EgressVerdict {
  return { allowed: false, reason, detail };
}

function defaultPort(protocol: string): number {
  return protocol === 'https:' ? 443 : 80;
}

/**
 * Host exactly as written in an absolute URL, before the URL parser
 * canonicalizes it. Returns null for relative references.
 */
function rawAuthorityHost(raw: string): string | null {
  const match = /^(?:[a-z][a-z0-9+.-]*:)?\/\/([^/?#]*)/i.exec(raw);
  if (!match) return null;
  const authority = match[1];
  const hostAndPort = authority.slice(authority.lastIndexOf('@') + 1);
  if (hostAndPort.startsWith('[')) {
    const end = hostAndPort.indexOf(']');
    return end >= 0 ? hostAndPort.slice(0, end + 1) : hostAndPort;
  }
  const colon = hostAndPort.indexOf(':');
  return (colon >= 0 ? hostAndPort.slice(0, colon) : hostAndPort).toLowerCase();
}

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

function isBlockedHostname(host: string, extra: ReadonlySet<string>): boolean {
  const name = host.replace(/\.$/, '');
  if (BLOCKED_HOSTNAMES.has(name) || extra.has(name)) return true;
  return BLOCKED_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

function describeClass(address: string, kind: AddressClass): string {
  return `${address} is a ${kind.replace('_', '-')} address`;
}

/**
 * Address that a host will be contacted at, after all checks passed
 */
export interface AdmittedTarget {
  url: URL;
  host: string;
  port: number;
  addresses: ResolvedAddress[];
  hop: number;
}

export interface ChainOptions {
  /** Exact hosts the chain may reach; empty or absent means any public host */
  allowedDomains?: readonly string[];
  maxRedirects?: number;
  allowSchemeChange?: boolean;
  /** Redirects are refused outright when false */
  followRedirects?: boolean;
  /** Bypass cached DNS answers (used by retries) */
  fresh?: boolean;
}

export class EgressPolicy {
  private readonly config: EgressConfig;
  private readonly resolver: HostResolver;
  private readonly extraBlocked: ReadonlySet<string>;

  constructor(config: Partial<EgressConfig> = {}, resolver?: HostResolver) {
    this.config = { ...DEFAULT_EGRESS_CONFIG, ...config };
    this.extraBlocked = new Set(this.config.blockedHostnames.map((name) => name.toLowerCase()));
    this.resolver = resolver ?? new CachingResolver(undefined, {
      ttlMs: this.config.dnsCacheTtlMs,
      maxEntries: this.config.dnsCacheSize,
    });
  }

  getConfig(): EgressConfig {
    return { ...this.config, allowedPorts: [...this.config.allowedPorts] };
  }

  /**
   * Static checks only; no DNS resolution
   */
  verdict(rawUrl: string): EgressVerdict {
    if (UNSAFE_CHARACTERS.test(rawUrl)) {
      return deny('control_characters', 'URL contains whitespace, control characters or a backslash');
    }

    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch {
      return deny('invalid_url', 'URL could not be parsed');
    }

    if (!ALLOWED_PROTOCOLS.has(url.protocol)) {
      return deny('scheme', `Blocked scheme ${url.protocol}; only http: and https: are allowed`);
    }

    if (url.username !== '' || url.password !== '') {
      return deny('credentials', 'URL embeds credentials');
    }

    const host = url.hostname.toLowerCase();
    const rawHost = SCHEME_PREFIX.test(rawUrl) ? rawAuthorityHost(rawUrl) : null;

    if (rawHost !== null) {
      if (rawHost.includes('%') && rawHost.startsWith('[')) {
        return deny('non_canonical_ip', 'IPv6 zone identifiers are not allowed');
      }
      if (parseIPv4(host) && rawHost !== host) {
        return deny('non_canonical_ip', `Host ${rawHost} is a non-canonical encoding of ${host}`);
      }
      if (looksLikeNumericHost(rawHost) && !parseIPv4(rawHost)) {
        return deny('non_canonical_ip', `Host ${rawHost} is a numeric address in non-canonical form`);
      }
    }

    const port = url.port === '' ? defaultPort(url.protocol) : Number(url.port);
    if (!this.config.allowedPorts.includes(port)) {
      return deny('port', `Port ${port} is not in the allowed set`);
    }

    if (isBlockedHostname(host, this.extraBlocked)) {
      return deny('blocked_hostname', `Blocked hostname ${host}`);
    }

    const literalClass = classifyAddress(host);
    if (literalClass !== null && literalClass !== 'public') {
      return deny('private_address', describeClass(stripBrackets(host), literalClass));
    }

    return { allowed: true, url, host, port };
  }

  /**
   * Static checks, throwing egress-denied on failure
   */
  check(rawUrl: string): URL {
    const result = this.verdict(rawUrl);
    if (!result.allowed) {
      throw this.denial(rawUrl, result.reason, result.detail);
    }
    return result.url;
  }

  /**
   * Resolve a host and require every answer to be public
   */
  async resolvePublic(host: string, fresh: boolean): Promise<ResolvedAddress[]> {
    const bare = stripBrackets(host);
    const literal = classifyAddress(bare);
    if (literal !== null) {
      return [{ address: bare, family: bare.includes(':') ? 6 : 4 }];
    }

    const answers = await this.resolver.resolve(host, { fresh });
    if (answers.length === 0) {
      throw new RecipeError('egress-denied', `No addresses found for ${host}`, {
        stage: 'egress',
        reasons: ['dns_failure'],
      });
    }

    for (const answer of answers) {
      const kind = classifyAddress(answer.address);
      if (kind !== 'public') {
        throw new RecipeError(
          'egress-denied',
          `${host} resolves to a non-public address (${describeClass(answer.address, kind ?? 'reserved')})`,
          { stage: 'egress', reasons: ['private_address'] }
        );
      }
    }
    return answers;
  }

  beginChain(options: ChainOptions = {}): EgressChain {
    return new EgressChain(this, {
      allowedDomains: (options.allowedDomains ?? []).map((domain) => domain.toLowerCase()),
      maxRedirects: options.maxRedirects ?? this.config.maxRedirects,
      allowSchemeChange: options.allowSchemeChange ?? this.config.allowSchemeChange,
      followRedirects: options.followRedirects ?? true,
      fresh: options.fresh ?? false,
    });
  }

  denial(rawUrl: string, reason: DenialReason, detail: string): RecipeError {
    log.warn('Egress denied', { url: redactUrl(rawUrl), reason, detail });
    return new RecipeError('egress-denied', `Egress denied: ${detail}`, {
      stage: 'egress',
      reasons: [reason],
    });
  }
}

/**
 * Policy state for one request attempt and its redirects
 */
export class EgressChain {
  private hops = 0;
  private current: URL | null = null;
  private readonly pins: Map<string, ResolvedAddress[]> = new Map();

  constructor(
    private readonly policy: EgressPolicy,
    private readonly options: Required<ChainOptions>
  ) {}

  get hopCount(): number {
    return this.hops;
  }

  get currentUrl(): URL | null {
    return this.current;
  }

  /**
   * Admit the first URL of the chain
   */
  async admit(rawUrl: string): Promise<AdmittedTarget> {
    if (this.current !== null) {
      return this.follow(rawUrl);
    }
    return this.enter(rawUrl, this.policy.verdict(rawUrl), 0);
  }

  /**
   * Validate a redirect target relative to the current URL
   */
  async follow(location: string): Promise<AdmittedTarget> {
    const current = this.current;
    if (current === null) {
      return this.admit(location);
    }
    if (!this.options.followRedirects) {
      throw this.policy.denial(location, 'redirect_disabled', 'Redirects are disabled for this request');
    }
    if (this.hops + 1 > this.options.maxRedirects) {
      throw this.policy.denial(
        location,
        'redirect_limit',
        `Redirect chain exceeds ${this.options.maxRedirects} hops`
      );
    }

    let next: URL;
    try {
      next = new URL(location, current);
    } catch {
      throw this.policy.denial(location, 'invalid_url', 'Redirect location could not be parsed');
    }

    // Absolute locations are inspected as written; relative ones as resolved
    const verdict = SCHEME_PREFIX.test(location) || location.startsWith('//')
      ? this.policy.verdict(location.startsWith('//') ? `${current.protocol}${location}` : location)
      : this.policy.verdict(next.href);

    if (verdict.allowed && verdict.url.protocol !== current.protocol && !this.options.allowSchemeChange) {
      throw this.policy.denial(
        next.href,
        'scheme_change',
        `Redirect changes scheme from ${current.protocol} to ${verdict.url.protocol}`
      );
    }

    const target = await this.enter(next.href, verdict, this.hops + 1);
    this.hops = target.hop;
    return target;
  }

  /**
   * Pinned addresses for a host admitted earlier in this chain
   */
  addressesFor(host: string): ResolvedAddress[] | undefined {
    return this.pins.get(host.toLowerCase());
  }

  private async enter(rawUrl: string, verdict: EgressVerdict, hop: number): Promise<AdmittedTarget> {
    if (!verdict.allowed) {
      throw this.policy.denial(rawUrl, verdict.reason, verdict.detail);
    }

    const { url, host, port } = verdict;
    const allowed = this.options.allowedDomains;
    if (allowed.length > 0 && !allowed.includes(host)) {
      throw this.policy.denial(rawUrl, 'domain_not_allowed', `Host ${host} is not in the allowed domain set`);
    }

    let addresses = this.pins.get(host);
    if (!addresses) {
      try {
        addresses = await this.policy.resolvePublic(host, this.options.fresh);
      } catch (error) {
        if (error instanceof RecipeError) {
          log.warn('Egress denied', { url: redactUrl(rawUrl), reason: error.reasons[0], host });
        }
        throw error;
      }
      this.pins.set(host, addresses);
    }

    this.current = url;
    return { url, host, port, addresses, hop };
  }
}
