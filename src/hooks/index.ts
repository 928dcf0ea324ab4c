export type { IndexableBuffer, Comparator, ProgressObserver, ElementTransform } from './capabilities.js';
export { comparing, observing } from './capabilities.js';
export { sortWithComparator } from './sort-with-comparator.js';
export { processWithProgress, doubleValue } from './process-with-progress.js';
