import { Option } from 'commander';
import { InvalidOperationError } from '../domain/errors/DomainErrors.js';
import { BACKEND_TYPES, isBackendType, type BackendType } from '../domain/value-objects/BackendType.js';
import { OUTPUT_FORMATS, type OutputFormat } from './formatters/OutputFormatter.js';

/** 各指令共用的選項 */
export interface CommonOptions {
  repoRoot: string;
  format: string;
}

export const repoRootOption = () =>
  new Option('--repo-root <path>', 'Repository root directory').default('.');

export const formatOption = () =>
  new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text');

export const backendOption = () =>
  new Option('--backend <type>', 'Build backend (detected from build files when omitted)').choices(BACKEND_TYPES);

export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) throw new InvalidOperationError(`Unknown output format: ${value}`);
  return format;
}

export function parseBackend(value: string): BackendType {
  if (!isBackendType(value)) throw new InvalidOperationError(`Unknown backend: ${value}`);
  return value;
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidOperationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
