export { daysBetween, isWithinDateTolerance, addDays, dateWindow, isValidIsoDate } from './date.js';
export { generatePendingId, generatePlaceholder, fingerprint } from './hash.js';
export { splitWords, wordNgrams } from './normalize.js';
