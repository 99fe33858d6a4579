import { describe, expect, it } from 'vitest'
import { extractDomainFromUrl } from '../domain.ts'

describe('extractDomainFromUrl', () => {
  it('should return the host without www', () => {
    expect(extractDomainFromUrl('https://www.Example.com/about?x=1')).toBe(
      'example.com',
    )
  })

  it('should keep other subdomains', () => {
    expect(extractDomainFromUrl('http://team.example.co.uk')).toBe(
      'team.example.co.uk',
    )
  })

  it('should accept bare hosts', () => {
    expect(extractDomainFromUrl('example.org/contact')).toBe('example.org')
  })

  it('should return null for input that is not a URL', () => {
    expect(extractDomainFromUrl('')).toBeNull()
    expect(extractDomainFromUrl('localhost')).toBeNull()
    expect(extractDomainFromUrl('https://exa mple.com')).toBeNull()
  })
})
