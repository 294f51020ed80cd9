import { DomainLists } from '../../config/triage';

export interface ParsedAddress {
  address: string;
  localPart: string;
  domain: string;
}

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * True when the domain equals the entry or is one of its subdomains
 */
export function domainMatches(domain: string, entry: string): boolean {
  const normalized = domain.toLowerCase();
  return normalized === entry || normalized.endsWith(`.${entry}`);
}

/**
 * Address parsing and domain-list membership shared by sender classification
 * and the outbound domain guardrail
 */
export class DomainValidator {
  private readonly domains: DomainLists;

  constructor(domains: DomainLists) {
    this.domains = domains;
  }

  /**
   * Parses "Name <user@host>" or a bare address.
   * @returns null when the address is missing or malformed
   */
  parseAddress(raw: string): ParsedAddress | null {
    if (!raw || typeof raw !== 'string') {
      return null;
    }

    let candidate = raw.trim();
    const open = candidate.lastIndexOf('<');
    const close = candidate.lastIndexOf('>');
    if (open !== -1 && close > open) {
      candidate = candidate.substring(open + 1, close).trim();
    }

    const normalized = candidate.toLowerCase();
    if (!EMAIL_REGEX.test(normalized)) {
      return null;
    }

    const atIndex = normalized.lastIndexOf('@');
    return {
      address: normalized,
      localPart: normalized.substring(0, atIndex),
      domain: normalized.substring(atIndex + 1)
    };
  }

  /**
   * Extracts the domain part (without "@") of an address, or '' when there is none
   */
  extractDomain(email: string): string {
    return this.parseAddress(email)?.domain ?? '';
  }

  /**
   * True when the domain equals a listed domain or is one of its subdomains
   */
  matchesDomain(domain: string, list: readonly string[]): boolean {
    return list.some(entry => domainMatches(domain, entry));
  }

  isVipAddress(address: string): boolean {
    return this.domains.vipAddresses.includes(address.toLowerCase());
  }

  isVipDomain(domain: string): boolean {
    return this.matchesDomain(domain, this.domains.vipDomains);
  }

  isInternal(domain: string): boolean {
    return this.matchesDomain(domain, this.domains.internalDomains);
  }

  isBlocked(domain: string): boolean {
    return this.matchesDomain(domain, this.domains.blockedDomains);
  }

  /**
   * Recipients on these domains need no approval signal
   */
  isAllowListed(domain: string): boolean {
    return this.isInternal(domain)
      || this.matchesDomain(domain, this.domains.allowedDomains)
      || this.isVipDomain(domain);
  }

  isVendor(domain: string): boolean {
    return this.matchesDomain(domain, this.domains.vendorDomains);
  }

  isCustomer(domain: string): boolean {
    return this.matchesDomain(domain, this.domains.customerDomains);
  }
}
