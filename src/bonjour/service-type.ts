/**
 * Conversion between DNS-SD type strings and bonjour-service's split
 * `{ type, protocol }` form.
 *
 *   "_http._tcp"        -> { type: 'http', protocol: 'tcp' }
 *   "_ipp._udp.local."  -> { type: 'ipp', protocol: 'udp' }
 *   "http"              -> { type: 'http', protocol: 'tcp' }
 */

export type ServiceProtocol = 'tcp' | 'udp'

export interface ParsedServiceType {
  type: string
  protocol: ServiceProtocol
}

export function parseServiceType(serviceType: string): ParsedServiceType {
  const labels = serviceType
    .replace(/\.$/, '')
    .replace(/\.local$/, '')
    .split('.')
    .filter((label) => label.length > 0)

  let protocol: ServiceProtocol = 'tcp'
  const last = labels[labels.length - 1]
  if (labels.length > 1 && (last === '_tcp' || last === '_udp')) {
    protocol = last === '_udp' ? 'udp' : 'tcp'
    labels.pop()
  }

  const type = labels.map((label) => label.replace(/^_/, '')).join('.')
  return { type, protocol }
}

export function formatServiceType(type: string, protocol: string = 'tcp'): string {
  return `_${type}._${protocol}`
}
