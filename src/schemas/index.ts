// ============================================
// Re-export all schemas and types
// ============================================

// PostRecord / UserProfile - harvester output
export {
  DecimalIdSchema,
  NAIVE_ISO_PATTERN,
  PostRecordSchema,
  UserProfileSchema,
  type PostRecord,
  type UserProfile,
} from './postRecord.js';

// Weibo API responses
export {
  RawIdSchema,
  RawCountSchema,
  OkFlagSchema,
  isOkFlag,
  PictureSchema,
  MblogSchema,
  CardSchema,
  ContainerEnvelopeSchema,
  UserInfoSchema,
  ProfileDataSchema,
  PageDataSchema,
  type RawCount,
  type Card,
} from './weiboApi.js';

// HarvestConfig - run configuration
export {
  IntRangeSchema,
  OutputEncodingSchema,
  HarvestConfigSchema,
  type IntRange,
  type OutputEncoding,
  type HarvestConfig,
} from './harvestConfig.js';
