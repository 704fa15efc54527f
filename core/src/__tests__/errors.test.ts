import {
  ColorDefinitionError,
  ColorError,
  ContractViolationError,
  MalformedStateError,
  ScanningError,
  assertContract,
  formatColorError
} from '../errors.js'
import { configureLogging, createLogger } from '../logging.js'

describe('errors', () => {
  it('should carry a code and the subclass name', () => {
    const error = new ScanningError('ab'.repeat(32))

    expect(error).toBeInstanceOf(ColorError)
    expect(error.name).toBe('ScanningError')
    expect(error.code).toBe('SCANNING_AMBIGUITY')
    expect(error.txid).toBe('ab'.repeat(32))
  })

  it('should throw a ContractViolationError from a failed assertion', () => {
    expect(() => assertContract(false, 'broken')).toThrow(ContractViolationError)
    expect(() => assertContract(true, 'fine')).not.toThrow()
  })

  describe('formatColorError', () => {
    it('should describe engine errors', () => {
      expect(formatColorError(new ScanningError('ab'.repeat(32))))
        .toBe('Asset could not be identified before the block was finalized')
      expect(formatColorError(new ColorDefinitionError('gold overlaps', 'DEFINITION_CONFLICT')))
        .toBe('Asset definition conflict: gold overlaps')
      expect(formatColorError(new ColorDefinitionError('no genesis')))
        .toBe('Invalid asset definition: no genesis')
      expect(formatColorError(new MalformedStateError('Truncated version')))
        .toBe('Stored color state could not be loaded: Truncated version')
    })

    it('should pass short messages through', () => {
      expect(formatColorError(new Error('Wallet is locked'))).toBe('Wallet is locked')
    })

    it('should fall back for empty or noisy messages', () => {
      expect(formatColorError(undefined, 'Try again')).toBe('Try again')
      expect(formatColorError(new Error('{"status":500}'))).toBe('Something went wrong!')
      expect(formatColorError(new Error('x'.repeat(200)), 'Try again')).toBe('Try again')
    })
  })
})

describe('logging', () => {
  afterEach(() => {
    configureLogging({ level: 'info', scopes: { Scanner: true } })
    jest.restoreAllMocks()
  })

  it('should prefix messages with level and scope', () => {
    const sink = jest.spyOn(console, 'log').mockImplementation(() => {})
    createLogger('Scanner').info('Tracking asset', { name: 'gold' })

    expect(sink).toHaveBeenCalledTimes(1)
    expect(sink).toHaveBeenCalledWith(expect.stringMatching(/\[info\] \[Scanner\]$/), 'Tracking asset', '{"name":"gold"}')
  })

  it('should drop messages below the configured level', () => {
    const sink = jest.spyOn(console, 'log').mockImplementation(() => {})
    configureLogging({ level: 'warn' })
    createLogger('Scanner').info('quiet')

    expect(sink).not.toHaveBeenCalled()
  })

  it('should silence disabled scopes', () => {
    const sink = jest.spyOn(console, 'warn').mockImplementation(() => {})
    configureLogging({ scopes: { Scanner: false } })
    createLogger('Scanner').warn('quiet')
    createLogger('Codec').warn('loud')

    expect(sink).toHaveBeenCalledTimes(1)
    expect(sink).toHaveBeenCalledWith(expect.stringMatching(/\[warn\] \[Codec\]$/), 'loud')
  })
})
