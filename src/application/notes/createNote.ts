import { Note, NoteRepository, assertValidTitle } from '../../domain/notes/note.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';

export interface CreateNoteCommand {
  ownerId: string;
  title: string;
  content?: string | null;
}

export class CreateNoteUseCase {
  constructor(
    private noteRepo: NoteRepository,
    private clock: Clock = systemClock
  ) {}

  async execute(command: CreateNoteCommand): Promise<Note> {
    assertValidTitle(command.title);

    return this.noteRepo.create({
      ownerId: command.ownerId,
      title: command.title,
      content: command.content ?? null,
      createdAt: this.clock(),
    });
  }
}
