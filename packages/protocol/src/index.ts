// @cmdbridge/protocol
// Wire and domain types for the command bridge and entity registry

export * from './types/index.js';

export {
  validateSubmitInput,
  validateWireResult,
  isSubmitCommandInput,
  isWireCommandResult,
  type ValidationResult,
  type ValidationIssue,
} from './validation/commands.js';

export {
  parseNdjson,
  parseNdjsonDetailed,
  stringifyNdjson,
  type ParseNdjsonOptions,
  type NdjsonParseResult,
} from './ndjson/ndjson.js';

export {
  isWireCommand,
  fromWireCommand,
  fromWireResult,
  toWireResult,
  MISSING_ERROR_MESSAGE,
} from './wire/wire.js';
