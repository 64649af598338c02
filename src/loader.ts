import yaml from 'js-yaml';
import {
  readdirSync,
  readFileSync
} from 'node:fs';
import {
  basename,
  extname,
  join
} from 'node:path';

import { Board } from './Board.ts';

export interface BoardSpec {
  readonly name: string;
  readonly text: string;
  readonly title: string;
}

const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export function listBoardFiles(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => join(dir, entry.name))
    .sort();
}

export function loadBoard(path: string): Board {
  return Board.parse(loadBoardSpec(path).text);
}

/**
 * Reads a board file.
 *
 * YAML files (`.yaml`, `.yml`) hold a mapping with a `board` string and an optional
 * `title`; any other file is taken as board text as-is.
 */
export function loadBoardSpec(path: string): BoardSpec {
  const extension = extname(path);
  const name = basename(path, extension);
  const content = readFileSync(path, 'utf-8');

  if (!YAML_EXTENSIONS.has(extension.toLowerCase())) {
    return { name, text: content, title: name };
  }

  const spec = yaml.load(content);
  if (typeof spec !== 'object' || spec === null || Array.isArray(spec)) {
    throw new Error(`${path}: YAML board must be a mapping`);
  }
  const board = 'board' in spec ? spec.board : undefined;
  const title = 'title' in spec ? spec.title : undefined;
  if (typeof board !== 'string') {
    throw new Error(`${path}: 'board' must be a string`);
  }
  if (title !== undefined && typeof title !== 'string') {
    throw new Error(`${path}: 'title' must be a string`);
  }
  const trimmedTitle = title?.trim() ?? '';
  return { name, text: board, title: trimmedTitle || name };
}
