import { readFileSync } from 'fs';
import { ValidationError, errorMessage, isPlainObject } from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';

export function readJsonFile(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read ${path}: ${errorMessage(error)}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`${path} is not valid JSON: ${errorMessage(error)}`);
  }
}

/** Read an initial state file; it must hold a JSON object. */
export function readStateFile(path: string | undefined): RunState {
  if (path === undefined) {
    return {};
  }

  const state = readJsonFile(path);
  if (!isPlainObject(state)) {
    throw new ValidationError(`${path} must contain a JSON object`);
  }
  return state;
}
