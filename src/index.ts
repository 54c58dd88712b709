// SPDX-License-Identifier: MIT
// Copyright Scott Dixon

export { types, RuleChain } from "./RuleChain/chain";
export type { ChainValue, Shape, InstanceTarget } from "./RuleChain/chain";
export { defineRecord, RecordInstance } from "./RuleChain/record";
export type { RecordInput, RecordType, WriteOptions } from "./RuleChain/record";
export { SchemaRegistry, defaultRegistry, registryFor } from "./RuleChain/registry";
export type { FieldDescriptor, FieldSpec, SchemaEntry } from "./RuleChain/registry";
export { sanitize, construct, validate, serialize } from "./RuleChain/pipeline";
export type { SanitizeOptions, SerializeOptions } from "./RuleChain/pipeline";
export { ErrorAggregator, formatReport, joinPath } from "./RuleChain/report";
export { SchemaError, InputError, ValidationException } from "./RuleChain/errors";
export { CodecError, DateCodec, DateTimeCodec, createCodec } from "./RuleChain/codecs";
export {
  identityCase,
  camelizeCase,
  snakeizeCase,
  resolveKeyCase,
  underscoredToCamel,
  camelToUnderscored,
} from "./RuleChain/keycase";
export * as operators from "./RuleChain/operators";
export { useRecord } from "./RuleChain/use";
export type { UseRecordOptions, UseRecordResult } from "./RuleChain/use";
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  FieldKind,
  PassMode,
  RecordView,
  OperatorContext,
  WriteContext,
  DiscardReason,
  Operator,
  Codec,
  KeyCaseConverter,
  KeyCasePolicy,
  ExtraFieldPolicy,
  ReadonlyViolationPolicy,
  RecordOptions,
  RecordStatus,
  ValidationError,
  ValidationReport,
} from "./RuleChain/types";
