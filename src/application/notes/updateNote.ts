import { Note, NotePatch, NoteRepository, assertValidTitle } from '../../domain/notes/note.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { NotFoundError } from '../errors.js';

export interface UpdateNoteCommand {
  noteId: string;
  ownerId: string;
  title?: string;
  content?: string | null;
}

/**
 * Partial update: fields left out of the command keep their stored value.
 */
export class UpdateNoteUseCase {
  constructor(
    private noteRepo: NoteRepository,
    private clock: Clock = systemClock
  ) {}

  async execute(command: UpdateNoteCommand): Promise<Note> {
    const patch: NotePatch = {};
    if (command.title !== undefined) {
      assertValidTitle(command.title);
      patch.title = command.title;
    }
    if (command.content !== undefined) {
      patch.content = command.content;
    }

    const existing = await this.noteRepo.findByIdForOwner(command.noteId, command.ownerId);
    if (!existing) {
      throw new NotFoundError();
    }

    // Keep updatedAt strictly after the previous value even on a coarse clock
    const now = this.clock();
    const updatedAt =
      now.getTime() > existing.updatedAt.getTime() ? now : new Date(existing.updatedAt.getTime() + 1);

    const updated = await this.noteRepo.update(command.noteId, command.ownerId, patch, updatedAt);
    if (!updated) {
      throw new NotFoundError();
    }
    return updated;
  }
}
