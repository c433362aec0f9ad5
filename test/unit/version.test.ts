import { describe, it, expect } from 'vitest'
import { parsePipVersion, selectOutputFormat, supportsVersionCheckFlag } from '../../src/utils'

describe('parsePipVersion', () => {
  it('reads the version from pip --version', () => {
    expect(
      parsePipVersion('pip 23.2.1 from /usr/lib/python3/dist-packages/pip (python 3.11)\n')
    ).toBe('23.2.1')
  })

  it('pads short versions', () => {
    expect(parsePipVersion('pip 9.0 from /opt/pip (python 2.7)')).toBe('9.0.0')
  })

  it('returns null for unrelated output', () => {
    expect(parsePipVersion('command not found')).toBeNull()
  })
})

describe('selectOutputFormat', () => {
  it('uses JSON after pip 9.0', () => {
    expect(selectOutputFormat('9.0.1')).toBe('structured')
    expect(selectOutputFormat('23.2.1')).toBe('structured')
  })

  it('falls back to text for pip 9.0 and older', () => {
    expect(selectOutputFormat('9.0.0')).toBe('legacy')
    expect(selectOutputFormat('8.1.2')).toBe('legacy')
  })

  it('assumes a recent pip when the version is unknown', () => {
    expect(selectOutputFormat(null)).toBe('structured')
  })
})

describe('supportsVersionCheckFlag', () => {
  it('is available from pip 6.0', () => {
    expect(supportsVersionCheckFlag('6.0.0')).toBe(true)
    expect(supportsVersionCheckFlag('1.5.6')).toBe(false)
    expect(supportsVersionCheckFlag(null)).toBe(true)
  })
})
