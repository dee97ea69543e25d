import { InvalidArgumentError, ValidationError } from '../errors.js';

export const TITLE_MAX_LENGTH = 200;
export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

export interface Note {
  readonly id: string;
  readonly ownerId: string;
  readonly title: string;
  readonly content: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewNote {
  ownerId: string;
  title: string;
  content: string | null;
  createdAt: Date;
}

export interface NotePatch {
  title?: string;
  content?: string | null;
}

export const NOTE_SORT_KEYS = ['created', '-created', 'title', '-title'] as const;
export type NoteSortKey = (typeof NOTE_SORT_KEYS)[number];

export interface NoteSort {
  field: 'createdAt' | 'title';
  direction: 'asc' | 'desc';
}

/**
 * Validated listing query. Build it with parseNoteListQuery.
 */
export interface NoteListQuery {
  search: string | null;
  sort: NoteSort;
  limit: number;
}

export interface RawNoteListQuery {
  search?: string;
  sort?: string;
  limit?: number | string;
}

/**
 * Note storage. Every read and write takes the owner id; a note that belongs
 * to someone else is treated exactly like a missing one.
 */
export interface NoteRepository {
  create(note: NewNote): Promise<Note>;
  findByIdForOwner(id: string, ownerId: string): Promise<Note | null>;
  /** Returns null when no note with this id belongs to the owner. */
  update(id: string, ownerId: string, patch: NotePatch, updatedAt: Date): Promise<Note | null>;
  delete(id: string, ownerId: string): Promise<boolean>;
  listByOwner(ownerId: string, query: NoteListQuery): Promise<Note[]>;
}

/**
 * Title length in characters (code points), matching how the database counts.
 */
export function titleLength(title: string): number {
  return [...title].length;
}

export function assertValidTitle(title: string): void {
  const length = titleLength(title);
  if (length < 1) {
    throw new ValidationError('title', 'Title must not be empty');
  }
  if (length > TITLE_MAX_LENGTH) {
    throw new ValidationError('title', `Title must be at most ${TITLE_MAX_LENGTH} characters`);
  }
}

function isSortKey(value: string): value is NoteSortKey {
  return NOTE_SORT_KEYS.some((key) => key === value);
}

export function parseSortKey(value: string | undefined): NoteSort {
  const key = value ?? '-created';
  if (!isSortKey(key)) {
    throw new InvalidArgumentError(
      'sort',
      `Invalid sort key "${key}". Expected one of: ${NOTE_SORT_KEYS.join(', ')}`
    );
  }

  const descending = key.startsWith('-');
  const name = descending ? key.slice(1) : key;
  return {
    field: name === 'title' ? 'title' : 'createdAt',
    direction: descending ? 'desc' : 'asc',
  };
}

export function parseLimit(value: number | string | undefined): number {
  if (value === undefined) {
    return DEFAULT_LIST_LIMIT;
  }

  const limit = typeof value === 'number' ? value : Number(value.trim() === '' ? NaN : value);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new InvalidArgumentError('limit', `Limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
  }
  return limit;
}

export function parseNoteListQuery(raw: RawNoteListQuery = {}): NoteListQuery {
  const search = raw.search !== undefined && raw.search !== '' ? raw.search : null;
  return {
    search,
    sort: parseSortKey(raw.sort),
    limit: parseLimit(raw.limit),
  };
}
