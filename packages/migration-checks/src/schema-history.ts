/**
 * Kafka Schema History
 *
 * Verifies the connector's schema history topic exists, is readable and
 * covers every expected table. Each stage short-circuits: once a stage fails
 * nothing further about the topic is knowable.
 */

import {
  CHECK_NAMES,
  Check,
  CheckInput,
  ConfigurationError,
  Finding,
  block,
  errorMessage,
  info,
} from '@shiftgate/migration-engine';

export interface KafkaInspector {
  topicExists(topic: string, signal: AbortSignal): Promise<boolean>;
  topicReadable(topic: string, signal: AbortSignal): Promise<boolean>;
  /** Tables recorded in the schema history topic */
  schemaHistoryTables(topic: string, signal: AbortSignal): Promise<string[]>;
}

export interface SchemaHistoryCheckOptions {
  inspector: KafkaInspector;
  topic: string;
  expectedTables?: string[];
}

export class SchemaHistoryCheck implements Check {
  readonly name = CHECK_NAMES.SCHEMA_HISTORY;
  readonly readOnly = true;
  private readonly inspector: KafkaInspector;
  private readonly topic: string;
  private readonly expectedTables: string[];

  constructor(options: SchemaHistoryCheckOptions) {
    if (!options.inspector) {
      throw new ConfigurationError('kafka inspector is required');
    }
    if (!options.topic || options.topic.trim() === '') {
      throw new ConfigurationError('schema history topic is required');
    }
    this.inspector = options.inspector;
    this.topic = options.topic;
    this.expectedTables = options.expectedTables ?? [];
  }

  async run(_input: CheckInput, signal: AbortSignal): Promise<Finding[]> {
    const topic = this.topic;
    const meta = { topic };

    let exists: boolean;
    try {
      exists = await this.inspector.topicExists(topic, signal);
    } catch (error) {
      return [block(`failed to check schema history topic "${topic}": ${errorMessage(error)}`, meta)];
    }
    if (!exists) {
      return [block(`schema history topic "${topic}" is missing`, meta)];
    }

    let readable: boolean;
    try {
      readable = await this.inspector.topicReadable(topic, signal);
    } catch (error) {
      return [block(`failed to read schema history topic "${topic}": ${errorMessage(error)}`, meta)];
    }
    if (!readable) {
      return [block(`schema history topic "${topic}" is not readable`, meta)];
    }

    let covered: string[];
    try {
      covered = await this.inspector.schemaHistoryTables(topic, signal);
    } catch (error) {
      return [block(`failed to read schema history coverage for "${topic}": ${errorMessage(error)}`, meta)];
    }

    const missing = missingTables(this.expectedTables, covered);
    if (missing.length > 0) {
      return [
        block(`schema history missing tables: ${missing.join(', ')}`, { topic, missing_tables: missing }),
      ];
    }

    return [info(`schema history topic "${topic}" is healthy`, meta)];
  }
}

/**
 * Expected tables absent from coverage, compared case-insensitively after
 * trimming. Blank expected entries are ignored; names are returned as given.
 */
export function missingTables(expected: string[], covered: string[]): string[] {
  const normalize = (name: string) => name.trim().toLowerCase();
  const coveredSet = new Set(covered.map(normalize));
  return expected.filter((table) => {
    const key = normalize(table);
    return key !== '' && !coveredSet.has(key);
  });
}
