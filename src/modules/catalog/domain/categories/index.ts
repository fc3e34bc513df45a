export { CategoryClassifier } from './classifier';
export { CATEGORY_DEFINITIONS, UNCATEGORIZED, type CategoryDefinition } from './definitions';
