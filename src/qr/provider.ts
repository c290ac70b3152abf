import QRCode from "qrcode-terminal/vendor/QRCode/index.js";
import QRErrorCorrectLevel from "qrcode-terminal/vendor/QRCode/QRErrorCorrectLevel.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  QrRenderError,
  stageFail,
  stageOk,
  type StageResult,
} from "../render/errors.js";
import { MAX_QR_VERSION, MIN_QR_VERSION, ModuleMatrix, moduleCountForVersion } from "./matrix.js";

export type ErrorCorrectionLevel = "L" | "M" | "Q" | "H";

export const ERROR_CORRECTION_LEVELS: readonly ErrorCorrectionLevel[] = ["L", "M", "Q", "H"];

const log = createSubsystemLogger("qr/provider");

const OVERFLOW_PATTERN = /code length overflow/i;

export function unknownVersionError(version: number): QrRenderError {
  return new QrRenderError(
    "unknown-version",
    `Unknown QR version ${version} (expected ${MIN_QR_VERSION}-${MAX_QR_VERSION}).`,
  );
}

/**
 * Encodes `payload` at a fixed version and error-correction level. The version
 * is never bumped to fit; a payload over capacity fails with `payload-too-large`.
 */
export function buildModuleMatrix(params: {
  payload: string;
  version: number;
  errorCorrection: ErrorCorrectionLevel;
}): StageResult<ModuleMatrix> {
  const { payload, version, errorCorrection } = params;
  const expectedSize = moduleCountForVersion(version);
  if (expectedSize === undefined) {
    return stageFail(unknownVersionError(version));
  }

  const qr = new QRCode(version, QRErrorCorrectLevel[errorCorrection]);
  qr.addData(payload);
  try {
    qr.make();
  } catch (err) {
    if (err instanceof Error && OVERFLOW_PATTERN.test(err.message)) {
      return stageFail(
        new QrRenderError(
          "payload-too-large",
          `Data is too long for QR version ${version} at error correction ${errorCorrection}. ` +
            "Choose a larger version (--qr-version) or a lower error correction level (--ec).",
          { cause: err },
        ),
      );
    }
    throw new Error(`QR encoding failed: ${formatErrorMessage(err)}`, { cause: err });
  }

  const size = qr.getModuleCount();
  if (size !== expectedSize) {
    throw new Error(`QR encoder produced ${size} modules for version ${version}`);
  }
  const matrix = new ModuleMatrix(size, (row, col) => qr.isDark(row, col));
  log.debug("built module matrix", { version, errorCorrection, size });
  return stageOk(matrix);
}
