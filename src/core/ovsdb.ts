import { OvsOutputError } from './errors';
import { OvsdbPortRowSchema, OvsdbTableSchema } from '../types/schemas';
import type { OvsdbTable } from '../types/schemas';

export interface OvsPortRecord {
  uuid?: string;
  name: string;
  externalIds: Record<string, string>;
  interfaces: string[];
}

/**
 * Parses the `{ headings, data }` document printed by
 * `ovs-vsctl --format json list|find <table>`.
 */
export function parseOvsdbTable(output: string): OvsdbTable {
  let raw: unknown;
  try {
    raw = JSON.parse(output);
  } catch (error) {
    throw new OvsOutputError('ovs-vsctl returned malformed JSON', output, { cause: error });
  }
  const result = OvsdbTableSchema.safeParse(raw);
  if (!result.success) {
    throw new OvsOutputError(
      `Unexpected ovs-vsctl table layout: ${result.error.issues.map(i => i.message).join('; ')}`,
      output
    );
  }
  return result.data;
}

export function tableRows(table: OvsdbTable): Record<string, unknown>[] {
  return table.data.map(row => {
    const record: Record<string, unknown> = {};
    table.headings.forEach((heading, index) => {
      record[heading] = row[index];
    });
    return record;
  });
}

export function decodePortRecords(output: string): OvsPortRecord[] {
  const table = parseOvsdbTable(output);
  if (!table.headings.includes('name')) {
    throw new OvsOutputError('Port table output has no name column', output);
  }

  return tableRows(table).map(row => {
    const result = OvsdbPortRowSchema.safeParse(row);
    if (!result.success) {
      throw new OvsOutputError(
        `Malformed Port record: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        output
      );
    }
    return {
      uuid: result.data._uuid,
      name: result.data.name,
      externalIds: result.data.external_ids,
      interfaces: result.data.interfaces
    };
  });
}
