import type { ColorScanner } from './ColorScanner.js'
import { ScannerCodec } from './ScannerCodec.js'
import { WALLET_EXTENSION_ID } from './constants.js'
import { createLogger } from './logging.js'

const log = createLogger('ColorWalletExtension')

/**
 * Stores the scanner state inside a wallet's extension storage. The wallet
 * keeps the bytes under {@link WALLET_EXTENSION_ID} and hands them back on load.
 */
export class ColorWalletExtension {
  constructor(private readonly scanner: ColorScanner) {}

  getScanner(): ColorScanner {
    return this.scanner
  }

  getWalletExtensionID(): string {
    return WALLET_EXTENSION_ID
  }

  /** Wallets without color support may load and ignore the extension */
  isWalletExtensionMandatory(): boolean {
    return false
  }

  serializeWalletExtension(): number[] {
    return ScannerCodec.encode(this.scanner)
  }

  deserializeWalletExtension(data: number[]): void {
    ScannerCodec.decode(data, this.scanner)
    log.info(`Loaded ${this.scanner.getColorTracks().length} color tracks`)
  }
}
