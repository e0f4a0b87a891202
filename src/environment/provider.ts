import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { ConfigurationError, describeError } from '../errors';
import { VariableMap } from '../script-engine/types';
import { toJsonValue } from '../script-engine/variables';
import { logger } from '../utils/logger';

/**
 * Source of the variables a run starts from and sink for the ones it ends with.
 */
export interface EnvironmentProvider {
  snapshot(): VariableMap;
  save(snapshot: VariableMap): void;
}

function toVariableMap(value: unknown, description: string): VariableMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`Expected ${description} to be a map`);
  }
  const result: VariableMap = {};
  for (const [name, entry] of Object.entries(value)) {
    const copy = toJsonValue(entry);
    if (copy !== undefined) {
      result[name] = copy;
    }
  }
  return result;
}

function parseContent(content: string): unknown {
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    return {};
  }
  return trimmed.startsWith('{') ? JSON.parse(content) : YAML.parse(content);
}

/** Missing files read as an empty map. */
function readDocument(filePath: string, description: string): unknown {
  if (!fs.existsSync(filePath)) {
    logger.debug(`No ${description} at ${filePath}, starting empty`);
    return {};
  }
  try {
    return parseContent(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${description} ${filePath}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Fixed environment, saved snapshot kept in memory.
 */
export class StaticEnvironmentProvider implements EnvironmentProvider {
  private saved?: VariableMap;

  constructor(private readonly environment: VariableMap) {}

  snapshot(): VariableMap {
    return toVariableMap(this.environment, 'environment');
  }

  save(snapshot: VariableMap): void {
    this.saved = toVariableMap(snapshot, 'snapshot');
  }

  lastSaved(): VariableMap | undefined {
    return this.saved;
  }
}

/**
 * Environment file holding one map per environment name, plus a snapshot file carrying the
 * persisted values of previous runs.
 */
export class EnvironmentFileProvider implements EnvironmentProvider {
  private constructor(private readonly initial: VariableMap, private readonly snapshotPath: string) {}

  static open(environmentName: string, environmentPath: string, snapshotPath: string): EnvironmentFileProvider {
    const environments = toVariableMap(readDocument(environmentPath, 'environment file'), 'environment file');
    const selected = environments[environmentName];
    if (selected === undefined) {
      logger.debug(`Environment "${environmentName}" not found in ${environmentPath}`);
    }
    const environment = toVariableMap(selected ?? {}, `environment "${environmentName}"`);
    const snapshot = toVariableMap(readDocument(snapshotPath, 'snapshot file'), 'snapshot file');

    return new EnvironmentFileProvider({ ...snapshot, ...environment }, snapshotPath);
  }

  snapshot(): VariableMap {
    return toVariableMap(this.initial, 'snapshot');
  }

  save(snapshot: VariableMap): void {
    const directory = path.dirname(this.snapshotPath);
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
    fs.writeFileSync(this.snapshotPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    logger.debug(`Snapshot saved to ${this.snapshotPath}`);
  }
}
