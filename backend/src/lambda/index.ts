/**
 * Lambda handlers export
 *
 * One handler per route of the transfer gateway API
 */

export { handler as startTransferHandler } from './startTransferHandler.js';
export { handler as findTransfersHandler } from './findTransfersHandler.js';
export { handler as transferInfoHandler } from './transferInfoHandler.js';
export { handler as transferInfoFieldHandler } from './transferInfoFieldHandler.js';
export { handler as cancelTransferHandler } from './cancelTransferHandler.js';
