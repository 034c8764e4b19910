/**
 * cardscan - Sync Module
 *
 * Board → lists → cards → comments into SQLite, then a contact scan per card.
 */

export * from './plan.js';
export * from './resolve.js';
export * from './scan.js';
export * from './synchronize.js';
