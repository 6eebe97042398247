/**
 * @file src/lib/persistence.ts
 * @description Save and restore the persisted part of AppState
 *
 * Only `count` is written; every other field comes back at its default.
 */
import { readFile, writeFile } from 'fs/promises';

import type { AppState, PersistedState } from '../types';
import { initialState } from '../store/reducers';

import { StateDecodeError } from './errors';
import { errorMessage } from './utils';

export const encodeState = (state: AppState): string => {
  const persisted: PersistedState = { count: state.count };
  return JSON.stringify(persisted);
};

export const decodeState = (text: string): AppState => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new StateDecodeError(
      `Saved state is not valid JSON: ${errorMessage(err)}`
    );
  }
  if (typeof data !== 'object' || data === null || !('count' in data)) {
    throw new StateDecodeError('Saved state has no count');
  }
  const { count } = data;
  if (typeof count !== 'number' || !Number.isSafeInteger(count)) {
    throw new StateDecodeError(
      `Saved count is not an integer: ${String(count)}`
    );
  }
  return { ...initialState, count };
};

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

export const loadState = async (path: string): Promise<AppState> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return initialState;
    throw err;
  }
  return decodeState(text);
};

export const saveState = async (
  path: string,
  state: AppState
): Promise<void> => {
  await writeFile(path, encodeState(state), 'utf8');
};
