import {
  NewNote,
  Note,
  NoteListQuery,
  NotePatch,
  NoteRepository,
} from '../../domain/notes/note.js';
import { DbPool } from './pool.js';

interface NoteRow {
  id: string;
  owner_id: string;
  title: string;
  content: string | null;
  created_at: Date;
  updated_at: Date;
}

const NOTE_COLUMNS = 'id, owner_id, title, content, created_at, updated_at';

// Titles sort by code point whatever the database collation, as in the in-memory store
const SORT_COLUMNS: Record<NoteListQuery['sort']['field'], string> = {
  createdAt: 'created_at',
  title: 'title COLLATE "C"',
};

function toNote(row: NoteRow): Note {
  return {
    id: row.id,
    ownerId: row.owner_id,
    title: row.title,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Escape LIKE wildcards so the search text is matched literally.
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

export function buildListNotesQuery(ownerId: string, query: NoteListQuery): SqlQuery {
  const values: unknown[] = [ownerId];
  let text = `SELECT ${NOTE_COLUMNS} FROM notes WHERE owner_id = $1`;

  if (query.search !== null) {
    values.push(`%${escapeLikePattern(query.search)}%`);
    text += ` AND title ILIKE $${values.length} ESCAPE '\\'`;
  }

  // Column and direction come from a fixed whitelist, never from user input
  const column = SORT_COLUMNS[query.sort.field];
  const direction = query.sort.direction === 'desc' ? 'DESC' : 'ASC';
  text += ` ORDER BY ${column} ${direction}, id ${direction}`;

  values.push(query.limit);
  text += ` LIMIT $${values.length}`;

  return { text, values };
}

export class PgNoteRepo implements NoteRepository {
  constructor(private pool: DbPool) {}

  async create(note: NewNote): Promise<Note> {
    const result = await this.pool.query<NoteRow>(
      `INSERT INTO notes (owner_id, title, content, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $4)
       RETURNING ${NOTE_COLUMNS}`,
      [note.ownerId, note.title, note.content, note.createdAt]
    );
    return toNote(result.rows[0]);
  }

  async findByIdForOwner(id: string, ownerId: string): Promise<Note | null> {
    const result = await this.pool.query<NoteRow>(
      `SELECT ${NOTE_COLUMNS} FROM notes WHERE id = $1 AND owner_id = $2`,
      [id, ownerId]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toNote(result.rows[0]);
  }

  async update(id: string, ownerId: string, patch: NotePatch, updatedAt: Date): Promise<Note | null> {
    const assignments: string[] = [];
    const values: unknown[] = [id, ownerId];

    if (patch.title !== undefined) {
      values.push(patch.title);
      assignments.push(`title = $${values.length}`);
    }
    if (patch.content !== undefined) {
      values.push(patch.content);
      assignments.push(`content = $${values.length}`);
    }
    values.push(updatedAt);
    assignments.push(`updated_at = $${values.length}`);

    const result = await this.pool.query<NoteRow>(
      `UPDATE notes SET ${assignments.join(', ')}
       WHERE id = $1 AND owner_id = $2
       RETURNING ${NOTE_COLUMNS}`,
      values
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toNote(result.rows[0]);
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM notes WHERE id = $1 AND owner_id = $2', [
      id,
      ownerId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async listByOwner(ownerId: string, query: NoteListQuery): Promise<Note[]> {
    const { text, values } = buildListNotesQuery(ownerId, query);
    const result = await this.pool.query<NoteRow>(text, values);
    return result.rows.map(toNote);
  }
}
