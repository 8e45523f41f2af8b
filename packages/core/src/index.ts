/**
 * @bytepair/core -- shared types, errors, ports and helpers.
 */
export * from "./errors.js";
export * from "./types.js";
export * from "./interfaces.js";
export { Registry } from "./registry.js";
export {
  resolveEncoderConfig,
  validateEncoderConfig,
  encoderConfigFromRecord,
  logLevelOf,
} from "./config.js";
export {
  toBytes,
  bytesToString,
  sequenceWidth,
  validUtf8Prefix,
  codePointAt,
  utf8Length,
} from "./utf8.js";
