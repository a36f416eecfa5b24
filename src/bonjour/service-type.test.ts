import { describe, it, expect } from 'vitest'
import { formatServiceType, parseServiceType } from './service-type.js'

describe('parseServiceType', () => {
  it('splits a DNS-SD type into type and protocol', () => {
    expect(parseServiceType('_http._tcp')).toEqual({ type: 'http', protocol: 'tcp' })
    expect(parseServiceType('_rtp._udp')).toEqual({ type: 'rtp', protocol: 'udp' })
  })

  it('strips the local domain and trailing dot', () => {
    expect(parseServiceType('_ipp._tcp.local.')).toEqual({ type: 'ipp', protocol: 'tcp' })
    expect(parseServiceType('_ipp._tcp.local')).toEqual({ type: 'ipp', protocol: 'tcp' })
  })

  it('defaults to tcp for a bare type', () => {
    expect(parseServiceType('nsd')).toEqual({ type: 'nsd', protocol: 'tcp' })
    expect(parseServiceType('_nsd')).toEqual({ type: 'nsd', protocol: 'tcp' })
  })
})

describe('formatServiceType', () => {
  it('joins type and protocol', () => {
    expect(formatServiceType('http', 'tcp')).toBe('_http._tcp')
    expect(formatServiceType('rtp', 'udp')).toBe('_rtp._udp')
    expect(formatServiceType('nsd')).toBe('_nsd._tcp')
  })
})
