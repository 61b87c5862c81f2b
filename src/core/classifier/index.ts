export {
  classifyField,
  explainClassification,
  classifyRecordSet,
  type ClassifierOptions,
} from './classifier'
export {
  CLASSIFICATION_RULES,
  PII_NAME_PATTERNS,
  DATE_NAME_PATTERNS,
  ID_SUFFIX,
  isIdentifierName,
  isMajority,
  piiKindFromName,
  type ClassificationInput,
  type ClassificationRuleDefinition,
} from './rules'
