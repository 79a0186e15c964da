import fs from 'fs/promises';
import { LineCounter, parseDocument as parseYaml } from 'yaml';
import { build } from './build.js';
import { err, ok, ParseError, type LoadError, type Result } from './errors.js';
import type { Infer, RawValue, Shape } from './shape.js';
import { exitWithError } from '../utils/exit.js';
import { logger } from '../utils/logger.js';

function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toRawValue);
  }
  if (typeof value === 'object') {
    const mapping: { [key: string]: RawValue } = {};
    for (const [key, item] of Object.entries(value)) {
      // defineProperty keeps a `__proto__` key as data instead of a prototype
      Object.defineProperty(mapping, key, {
        value: toRawValue(item),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return mapping;
  }
  return String(value);
}

/**
 * Parse YAML text into a raw value. An empty document is an empty mapping.
 */
export function parseDocument(text: string): Result<RawValue, ParseError> {
  const lineCounter = new LineCounter();
  const doc = parseYaml(text, { lineCounter, prettyErrors: false });

  if (doc.errors.length > 0) {
    const first = doc.errors[0];
    const { line, col } = lineCounter.linePos(first.pos[0]);
    return err(new ParseError(first.message, line, col));
  }

  // Alias expansion happens here and can still fail
  let value: unknown;
  try {
    value = doc.toJS();
  } catch (error) {
    const { line, col } = lineCounter.linePos(doc.contents?.range?.[0] ?? 0);
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ParseError(reason, line, col));
  }

  const raw = toRawValue(value);
  return ok(raw === null ? {} : raw);
}

export function load<S extends Shape>(shape: S, text: string): Result<Infer<S>, LoadError> {
  const parsed = parseDocument(text);
  if (!parsed.ok) return parsed;
  return build(shape, parsed.value);
}

interface LoadFileOptions {
  /** Treat a file that does not exist as an empty document. */
  allowMissing?: boolean;
}

async function readDocument(file: string, options: LoadFileOptions): Promise<string> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (error) {
    if (options.allowMissing && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.info(`${file} does not exist, using an empty document`);
      return '';
    }
    throw error;
  }
}

export async function loadFile<S extends Shape>(
  shape: S,
  file: string,
  options: LoadFileOptions = {}
): Promise<Result<Infer<S>, LoadError>> {
  const text = await readDocument(file, options);
  const result = load(shape, text);
  if (result.ok) {
    logger.info(`Loaded ${file}`);
  } else {
    logger.error(`Failed to load ${file}: ${result.error.message}`);
  }
  return result;
}

/**
 * Load a document, or report the failure with the file name and exit.
 */
export async function loadFileOrExit<S extends Shape>(
  shape: S,
  file: string,
  options: LoadFileOptions = {}
): Promise<Infer<S>> {
  const result = await loadFile(shape, file, options);
  if (!result.ok) {
    exitWithError(result.error.message, file);
  }
  return result.value;
}
