/**
 * How confidence scores are filled in when the model rates fewer documents
 * than it extracted:
 * - REPEAT_FIRST: reuse the first confidence mapping for the missing documents
 * - DEFAULT_LOW: treat every field of the missing documents as Low
 */
export enum ConfidencePaddingPolicy {
  REPEAT_FIRST = 'repeat-first',
  DEFAULT_LOW = 'default-low',
}
