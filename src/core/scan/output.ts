import type { SettingRecord } from '../settings/types.js';
import type { OutputFormat } from '../config/schema.js';
import {
  ErrorCodes,
  SystemError,
  errorMessage,
  stringifyYaml,
  writeFile,
} from '../../utils/index.js';

/**
 * Serialized record; keys are emitted in this order.
 */
export interface OutputRecord {
  name: string;
  rawName: string;
  type: string;
  properties: string[];
  defaultValue: string;
  sourceLine: number;
  sourceFile: string;
}

export function toOutputRecord(record: SettingRecord): OutputRecord {
  return {
    name: record.name,
    rawName: record.rawName,
    type: record.type,
    properties: [...record.properties],
    defaultValue: record.defaultValue,
    sourceLine: record.sourceLine,
    sourceFile: record.sourceFile,
  };
}

/**
 * Render records as pretty-printed JSON or YAML, newline-terminated.
 */
export function serializeRecords(
  records: readonly SettingRecord[],
  format: OutputFormat = 'json'
): string {
  const output = records.map(toOutputRecord);
  if (format === 'yaml') {
    return stringifyYaml(output);
  }
  return `${JSON.stringify(output, null, 2)}\n`;
}

export async function writeRecords(
  filePath: string,
  records: readonly SettingRecord[],
  format: OutputFormat = 'json'
): Promise<void> {
  try {
    await writeFile(filePath, serializeRecords(records, format));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.OUTPUT_WRITE_FAILED,
      `Failed to write ${filePath}: ${errorMessage(error)}`,
      { filePath }
    );
  }
}
