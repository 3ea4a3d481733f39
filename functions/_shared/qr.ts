import QRCode from 'qrcode';

export const QR_IMAGE_SIZE = 256;
export const QR_MIN_MODULE_SIZE = 4;
// Above this many characters the symbol drops to medium error correction to stay small enough.
export const QR_HIGH_ECC_MAX_LENGTH = 100;

export type QrErrorCorrectionLevel = 'H' | 'M';

export type QrExportErrorCode = 'qr_encoding_failed' | 'qr_module_too_small';

export class QrExportError extends Error {
  readonly code: QrExportErrorCode;

  constructor(code: QrExportErrorCode, message: string) {
    super(message);
    this.name = 'QrExportError';
    this.code = code;
  }
}

export function errorCorrectionFor(password: string): QrErrorCorrectionLevel {
  return [...password].length > QR_HIGH_ECC_MAX_LENGTH ? 'M' : 'H';
}

function createSymbol(password: string, errorCorrectionLevel: QrErrorCorrectionLevel) {
  try {
    return QRCode.create(password, { errorCorrectionLevel });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new QrExportError('qr_encoding_failed', `Unable to encode password as QR code: ${reason}`);
  }
}

export type QrSymbolInfo = {
  version: number;
  errorCorrectionLevel: QrErrorCorrectionLevel;
  moduleCount: number;
  moduleSize: number;
};

export function describeQrSymbol(password: string): QrSymbolInfo {
  const errorCorrectionLevel = errorCorrectionFor(password);
  const symbol = createSymbol(password, errorCorrectionLevel);
  const moduleCount = symbol.modules.size;

  return {
    version: symbol.version,
    errorCorrectionLevel,
    moduleCount,
    moduleSize: Math.floor(QR_IMAGE_SIZE / moduleCount),
  };
}

export async function renderPasswordQr(password: string): Promise<Uint8Array> {
  const { errorCorrectionLevel, moduleCount, moduleSize } = describeQrSymbol(password);
  if (moduleSize < QR_MIN_MODULE_SIZE) {
    throw new QrExportError(
      'qr_module_too_small',
      `Module size too small (${moduleSize}) for dimension ${moduleCount}`,
    );
  }

  return QRCode.toBuffer(password, {
    type: 'png',
    errorCorrectionLevel,
    width: QR_IMAGE_SIZE,
  });
}
