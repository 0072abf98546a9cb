/**
 * Host header validation against ALLOWED_HOSTS.
 *
 *   "*"            any host
 *   ".example.com" example.com and every subdomain
 *   "example.com"  exact match
 */

const DEBUG_HOSTS = ["localhost", "127.0.0.1", "[::1]"];

/** Lower-cased host without its port; brackets kept for IPv6 literals. */
export function stripPort(host: string): string {
  const value = host.trim().toLowerCase();
  if (value.startsWith("[")) {
    const end = value.indexOf("]");
    return end === -1 ? value : value.slice(0, end + 1);
  }
  const colon = value.lastIndexOf(":");
  return colon === -1 ? value : value.slice(0, colon);
}

export function effectiveAllowedHosts(allowedHosts: string[], debug: boolean): string[] {
  if (allowedHosts.length === 0 && debug) return DEBUG_HOSTS;
  return allowedHosts;
}

export function isHostAllowed(host: string | null, allowedHosts: string[]): boolean {
  if (!host) return false;
  const name = stripPort(host).replace(/\.$/, "");
  if (!name) return false;
  return allowedHosts.some((pattern) => {
    if (pattern === "*") return true;
    if (pattern.startsWith(".")) {
      return name === pattern.slice(1) || name.endsWith(pattern);
    }
    return name === pattern;
  });
}
