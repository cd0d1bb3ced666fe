import { parseEther } from 'ethers'
import { loadConfig, CONSTANTS } from '../../src/config'
import { AUTHORITY } from '../helpers'

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({})
    expect(cfg).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      LOG_LEVEL: 'info',
      FUNDING_THRESHOLD_ETH: parseEther('10'),
      INSURANCE_CAP_ETH: parseEther('1'),
      ADMISSION_BOOTSTRAP_LIMIT: 4,
      SETTLEMENT_MODE: 'memory',
    })
    expect(cfg.AUTHORITY_ADDRESS).toBeUndefined()
  })

  it('parses ether amounts and checksums the authority', () => {
    const cfg = loadConfig({ FUNDING_THRESHOLD_ETH: '2.5', PORT: '8080', AUTHORITY_ADDRESS: AUTHORITY.toLowerCase() })
    expect(cfg.FUNDING_THRESHOLD_ETH).toBe(parseEther('2.5'))
    expect(cfg.PORT).toBe(8080)
    expect(cfg.AUTHORITY_ADDRESS).toBe(AUTHORITY)
  })

  it('lists every invalid field', () => {
    expect(() => loadConfig({ PORT: 'abc', AUTHORITY_ADDRESS: 'nope' })).toThrow(
      /^Invalid ledger-server configuration: PORT: .*; AUTHORITY_ADDRESS: AUTHORITY_ADDRESS must be an address$/
    )
  })

  it('requires a key in signer mode', () => {
    expect(() => loadConfig({ SETTLEMENT_MODE: 'signer' })).toThrow(
      'Invalid ledger-server configuration: SETTLEMENT_PRIVATE_KEY is required when SETTLEMENT_MODE=signer'
    )
  })

  it('exposes the API version', () => {
    expect(CONSTANTS.API_VERSION).toBe('v1')
  })
})
