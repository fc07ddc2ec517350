export * from './types/index.js';
export {
  FIRMWARE,
  ENUMS_OF_INTEREST,
  MACROS,
  MACROS_OF_INTEREST,
  SELECTION,
  UNITS,
  type EnumTypeName,
} from './constants/index.js';

export {
  FilterBandCompileError,
  ArrayLiteralNotFoundError,
  MalformedArrayElementError,
  EmptyFilterTableError,
  UnknownReferenceError,
  ModelInvariantError,
  type CompileErrorCode,
} from './services/firmware/errors.js';
export { stripComments, parseCInteger } from './services/firmware/c-text.js';
export { extractEnums, extractMacros, extractHeader, type ExtractOptions } from './services/firmware/header-extractor.js';
export {
  locateArrayBody,
  parseArrayElements,
  parseFilterBandArray,
  type ArrayBody,
} from './services/firmware/array-parser.js';
export { SourceWatcher, type SourceWatcherOptions } from './services/firmware/source-watcher.js';

export { FrequencyRange } from './services/filterbands/frequency-range.js';
export { EnumDefinition } from './services/filterbands/enum-definition.js';
export {
  FilterBandModel,
  entryFromRecord,
  entryToRecord,
  type FilterBandEntry,
  type FilterBandModelInit,
} from './services/filterbands/filter-band-model.js';
export { buildFilterBandModel, type BuildResult } from './services/filterbands/model-builder.js';
export {
  selectFilter,
  selectFilterForBand,
  resolveSwitchDirection,
  describeSelection,
  filterLimit,
  khzToDmhz,
  occupiedSpan,
  rangeFor,
  type OccupiedSpan,
} from './services/filterbands/band-selector.js';
export { bandFilterFor3gppBand } from './services/filterbands/band-mapping.js';

export { compileFilterBands, compileFilterBandFiles, type CompileOptions } from './services/compiler.js';
export {
  generateModule,
  runtimeImportFor,
  writeModule,
  type GenerateOptions,
  type WriteModuleOptions,
} from './services/codegen/module-generator.js';
