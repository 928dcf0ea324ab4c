export type { ElementPolicy } from './element-policy.js';
export { valuePolicy, VALUE_SLOT_BYTES } from './element-policy.js';
export type { CollectionStorage } from './fixed-capacity-collection.js';
export { FixedCapacityCollection, allocateStorage, CONTAINER_HEADER_BYTES } from './fixed-capacity-collection.js';
export type { Point2D } from './owned-record-collection.js';
export { OwnedRecordCollection, POINT2D_FIELDS, POINT2D_BYTES } from './owned-record-collection.js';
export type { StringSource, OwnedText } from './owned-string-collection.js';
export { OwnedStringCollection, STRING_SLOT_BYTES } from './owned-string-collection.js';
