import {
  Note,
  NoteRepository,
  RawNoteListQuery,
  parseNoteListQuery,
} from '../../domain/notes/note.js';
import { NotFoundError } from '../errors.js';

export class NoteQueries {
  constructor(private noteRepo: NoteRepository) {}

  async getNote(noteId: string, ownerId: string): Promise<Note> {
    const note = await this.noteRepo.findByIdForOwner(noteId, ownerId);
    if (!note) {
      throw new NotFoundError();
    }
    return note;
  }

  /**
   * Throws InvalidArgumentError for an unknown sort key or a limit outside 1..100.
   */
  async listNotes(ownerId: string, rawQuery: RawNoteListQuery = {}): Promise<Note[]> {
    const query = parseNoteListQuery(rawQuery);
    return this.noteRepo.listByOwner(ownerId, query);
  }
}
