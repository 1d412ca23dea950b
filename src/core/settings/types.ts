/**
 * Setting extraction types.
 */

/**
 * One configuration setting discovered in source.
 */
export interface SettingRecord {
  /** Setting key: the first argument's literal token */
  readonly name: string;
  /** Variable the setting is assigned to */
  readonly rawName: string;
  /** Value type, e.g. `Integer` or `List of String` */
  readonly type: string;
  /** Property flag names in encounter order, duplicates kept */
  readonly properties: readonly string[];
  /** Canonical form of the second argument */
  readonly defaultValue: string;
  readonly sourceLine: number;
  /** Path relative to the scanned root, `/`-separated */
  readonly sourceFile: string;
}

export type DiagnosticCode = 'INSUFFICIENT_ARGUMENTS';

/**
 * Non-fatal problem found while extracting a candidate.
 */
export interface ExtractionDiagnostic {
  code: DiagnosticCode;
  message: string;
  sourceFile: string;
  sourceLine: number;
  /** Variable name of the skipped candidate; empty when unknown */
  rawName: string;
  argumentCount: number;
}

/**
 * Result of extracting one file's tree.
 */
export interface FileExtraction {
  records: SettingRecord[];
  diagnostics: ExtractionDiagnostic[];
}

/**
 * Names the extractor matches on.
 */
export interface MatchOptions {
  /** Base type of setting fields (default: `Setting`) */
  settingTypeName?: string;
  /** Qualifier that marks property flag constants (default: `Property`) */
  propertyAnchorName?: string;
}

export interface ExtractOptions extends MatchOptions {
  /** Provenance recorded on every record and diagnostic */
  sourceFile: string;
}

export const DEFAULT_SETTING_TYPE_NAME = 'Setting';
export const DEFAULT_PROPERTY_ANCHOR_NAME = 'Property';

/** Minimum resolved arguments: key, default value, one more. */
export const MIN_SETTING_ARGUMENTS = 3;
