import { mkdir, writeFile } from 'fs/promises';
import { dirname, relative, sep } from 'path';
import { ENUMS_OF_INTEREST } from '../../constants/index.js';
import type { FilterBandEntryRecord } from '../../types/index.js';
import type { EnumDefinition } from '../filterbands/enum-definition.js';
import type { FilterBandModel } from '../filterbands/filter-band-model.js';
import { entryToRecord } from '../filterbands/filter-band-model.js';

export interface GenerateOptions {
  /** Module specifier the generated file imports the runtime from */
  runtimeImport: string;
  /** Source file names quoted in the header comment */
  sources?: string[];
  generator?: string;
}

/**
 * Import specifier from the generated file to the library entry point,
 * written the way NodeNext expects (.js extension, ./ prefix).
 */
export function runtimeImportFor(outputPath: string, libraryEntry: string): string {
  let specifier = relative(dirname(outputPath), libraryEntry).split(sep).join('/');
  specifier = specifier.replace(/\.ts$/, '.js');
  if (!specifier.startsWith('.')) {
    specifier = `./${specifier}`;
  }
  return specifier;
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function enumBlock(exportName: string, definition: EnumDefinition): string {
  const lines = [`/** ${definition.typeName} */`, `export const ${exportName} = {`];
  for (const member of definition.members) {
    lines.push(`  ${member.name}: ${member.value},`);
  }
  lines.push('} as const;');
  lines.push(`export type ${exportName} = (typeof ${exportName})[keyof typeof ${exportName}];`);
  return lines.join('\n');
}

function entryLine(record: FilterBandEntryRecord): string {
  const fields = [
    `hardwareId: ${record.hardwareId}`,
    `uplink: [${record.uplink[0]}, ${record.uplink[1]}]`,
    `downlink: [${record.downlink[0]}, ${record.downlink[1]}]`,
    `directionMask: ${record.directionMask}`,
    `legacyFilterId: ${record.legacyFilterId}`,
    `band: ${quote(record.band)}`,
    `protocolBandNumber: ${record.protocolBandNumber}`,
    `filterSlot: ${record.filterSlot}`,
    `filtersInGroup: ${record.filtersInGroup}`,
    `extraFlags: ${record.extraFlags}`,
    `calibrationGroup: ${quote(record.calibrationGroup)}`,
  ];
  return `    { ${fields.join(', ')} },`;
}

function enumLiteral(definition: EnumDefinition): string {
  const members = definition.members.map((m) => `{ name: ${quote(m.name)}, value: ${m.value} }`);
  return `{ typeName: ${quote(definition.typeName)}, members: [${members.join(', ')}] }`;
}

/**
 * Render a compiled model as a TypeScript module. The module carries the
 * table as data and rebuilds the model through FilterBandModel.fromSnapshot,
 * so every invariant is checked again when it is first imported.
 */
export function generateModule(model: FilterBandModel, options: GenerateOptions): string {
  const generator = options.generator ?? 'generate-filter-bands';
  const from = options.sources?.length ? ` from ${options.sources.join(' / ')}` : '';
  const macroNames = Object.keys(model.macros).sort();

  const out: string[] = [
    `// Auto-generated by ${generator}${from}. Do not edit manually.`,
    `import { FilterBandModel, FrequencyRange } from ${quote(options.runtimeImport)};`,
    `import type { Direction, FilterBandEntry, FilterBandSnapshot } from ${quote(options.runtimeImport)};`,
    '',
    'export { FrequencyRange };',
    'export type { Direction, FilterBandEntry };',
    '',
    enumBlock(ENUMS_OF_INTEREST.duplexor_direction_t, model.directionEnum),
    '',
    enumBlock(ENUMS_OF_INTEREST.band_filter_t, model.bandFilterEnum),
    '',
    enumBlock(ENUMS_OF_INTEREST.Covert872CalDataLookup_t, model.calibrationEnum),
    '',
    ...macroNames.map((name) => `export const ${name} = ${model.macros[name]};`),
    '',
    'const snapshot: FilterBandSnapshot = {',
    '  enums: {',
    `    direction: ${enumLiteral(model.directionEnum)},`,
    `    bandFilter: ${enumLiteral(model.bandFilterEnum)},`,
    `    calibrationLookup: ${enumLiteral(model.calibrationEnum)},`,
    '  },',
    `  macros: { ${macroNames.map((name) => `${name}: ${model.macros[name]}`).join(', ')} },`,
    `  widebandId: ${model.widebandId},`,
    '  entries: [',
    ...model.entries.map((entry) => entryLine(entryToRecord(entry))),
    '  ],',
    '};',
    '',
    'export const model = FilterBandModel.fromSnapshot(snapshot);',
    '',
    'export const WIDEBAND_HARDWARE_ID = model.widebandId;',
    'export const RX_FILTER_BANDS: readonly FilterBandEntry[] = model.entries;',
    'export const BANDS_BY_FILTER = model.byBand;',
    'export const FILTERS_BY_PROTOCOL_BAND = model.byProtocolBand;',
    'export const FILTERS_BY_CAL_LOOKUP = model.byCalibrationGroup;',
    '',
    'export function selectFilter(',
    '  centreFreqKhz: number,',
    '  bandwidthKhz: number,',
    '  direction: Direction,',
    '  candidateIds?: readonly number[]',
    '): number | null {',
    '  return model.select(centreFreqKhz, bandwidthKhz, direction, candidateIds);',
    '}',
    '',
  ];

  return out.join('\n');
}

export interface WriteModuleOptions extends Omit<GenerateOptions, 'runtimeImport'> {
  /** Path of the library entry point (src/index.ts) */
  runtimeEntry: string;
}

/** Render the module and write it, creating the output directory if needed */
export async function writeModule(model: FilterBandModel, outputPath: string, options: WriteModuleOptions): Promise<void> {
  const text = generateModule(model, {
    runtimeImport: runtimeImportFor(outputPath, options.runtimeEntry),
    sources: options.sources,
    generator: options.generator,
  });
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, text, 'utf8');
}
