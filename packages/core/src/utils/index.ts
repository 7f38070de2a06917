export { normalizeText } from './normalize.js';
export { fingerprintV0, fingerprintHashV1 } from './fingerprint.js';
export { parseAmount, directionFromAmount, toAmountKey } from './amount.js';
export type { Direction } from './amount.js';
export { cellText, pickField, pickBatchColumn } from './cell.js';
export { parseDateValue, parseIsoDate, parseDmyDate, formatIsoDate, excelSerialToDate } from './date-parse.js';
export { stripBom } from './csv.js';
