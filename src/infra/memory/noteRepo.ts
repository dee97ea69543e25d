import { randomUUID } from 'crypto';
import {
  NewNote,
  Note,
  NoteListQuery,
  NotePatch,
  NoteRepository,
  NoteSort,
} from '../../domain/notes/note.js';

/**
 * Code point order, the same as `COLLATE "C"` on a UTF-8 database.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = [...a];
  const right = [...b];
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}

function compareNotes(sort: NoteSort): (a: Note, b: Note) => number {
  const sign = sort.direction === 'desc' ? -1 : 1;
  return (a, b) => {
    let order: number;
    if (sort.field === 'title') {
      order = compareCodePoints(a.title, b.title);
    } else {
      order = a.createdAt.getTime() - b.createdAt.getTime();
    }
    if (order === 0) {
      order = a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    }
    return sign * order;
  };
}

/**
 * Map-backed note storage. Records are replaced, never mutated in place.
 */
export class InMemoryNoteRepo implements NoteRepository {
  private notes = new Map<string, Note>();

  async create(newNote: NewNote): Promise<Note> {
    const note: Note = {
      id: randomUUID(),
      ownerId: newNote.ownerId,
      title: newNote.title,
      content: newNote.content,
      createdAt: newNote.createdAt,
      updatedAt: newNote.createdAt,
    };
    this.notes.set(note.id, note);
    return note;
  }

  async findByIdForOwner(id: string, ownerId: string): Promise<Note | null> {
    const note = this.notes.get(id);
    if (!note || note.ownerId !== ownerId) {
      return null;
    }
    return note;
  }

  async update(id: string, ownerId: string, patch: NotePatch, updatedAt: Date): Promise<Note | null> {
    const existing = await this.findByIdForOwner(id, ownerId);
    if (!existing) {
      return null;
    }

    const updated: Note = {
      ...existing,
      title: patch.title ?? existing.title,
      content: patch.content !== undefined ? patch.content : existing.content,
      updatedAt,
    };
    this.notes.set(id, updated);
    return updated;
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    if (!(await this.findByIdForOwner(id, ownerId))) {
      return false;
    }
    return this.notes.delete(id);
  }

  async listByOwner(ownerId: string, query: NoteListQuery): Promise<Note[]> {
    const needle = query.search?.toLowerCase() ?? null;

    return [...this.notes.values()]
      .filter((note) => note.ownerId === ownerId)
      .filter((note) => needle === null || note.title.toLowerCase().includes(needle))
      .sort(compareNotes(query.sort))
      .slice(0, query.limit);
  }
}
