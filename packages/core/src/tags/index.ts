export { TagSchema, normalizeTag, normalizeTags, comparisonKey, type Tag } from './tag';
export { PathKeySchema, toPathKey, type PathKey } from './path-key';
export { TagSet } from './tag-set';
