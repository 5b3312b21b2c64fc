const LABEL_SEPARATOR = '.';
const MAIN_DOMAIN_LABELS = 2;

/**
 * Reduce a host to its "main domain": the last two dot-separated labels.
 *
 * `docs.example.com` and `a.b.example.com` both become `example.com`; hosts
 * with two labels or fewer are returned unchanged. Multi-part public suffixes
 * are not recognised, so `shop.example.co.uk` becomes `co.uk`.
 */
export function mainDomain(host: string): string {
  const labels = host.split(LABEL_SEPARATOR);
  if (labels.length <= MAIN_DOMAIN_LABELS) {
    return host;
  }
  return labels.slice(-MAIN_DOMAIN_LABELS).join(LABEL_SEPARATOR);
}

export function sameMainDomain(hostA: string, hostB: string): boolean {
  return mainDomain(hostA) === mainDomain(hostB);
}
