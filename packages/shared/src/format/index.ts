/**
 * Formatting Module
 *
 * Electronic, print and short formats for ICANs.
 * Normalization used by every engine entry point lives here.
 *
 * @module @ican/shared/format
 *
 * @example
 * ```typescript
 * import { electronicFormat, printFormat, shortFormat } from '@ican/shared';
 *
 * electronicFormat('de89 3704 0044 0532 0130 00'); // 'DE89370400440532013000'
 * printFormat('DE89370400440532013000'); // 'DE89 3704 0044 0532 0130 00'
 * shortFormat('DE89370400440532013000'); // 'DE89…3000'
 * ```
 */

export { electronicFormat, printFormat, shortFormat } from './format.js';
