/**
 * Preparer module: records to comparison views.
 */

export { prepareTransaction, prepareTransactions } from './prepare.js';
export { FIELD_FALLBACKS, SIGNED_AMOUNT_COLUMN } from './fields.js';
