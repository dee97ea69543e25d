import { NoteRepository } from '../../domain/notes/note.js';
import { NotFoundError } from '../errors.js';

export interface DeleteNoteCommand {
  noteId: string;
  ownerId: string;
}

export interface DeleteNoteResult {
  deleted: true;
  id: string;
}

export class DeleteNoteUseCase {
  constructor(private noteRepo: NoteRepository) {}

  async execute(command: DeleteNoteCommand): Promise<DeleteNoteResult> {
    const removed = await this.noteRepo.delete(command.noteId, command.ownerId);
    if (!removed) {
      throw new NotFoundError();
    }
    return { deleted: true, id: command.noteId };
  }
}
