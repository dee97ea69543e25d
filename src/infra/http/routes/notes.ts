import { Router } from 'express';
import { z } from 'zod';
import { AuthGate } from '../../../application/auth/authGate.js';
import { CreateNoteUseCase } from '../../../application/notes/createNote.js';
import { UpdateNoteUseCase } from '../../../application/notes/updateNote.js';
import { DeleteNoteUseCase } from '../../../application/notes/deleteNote.js';
import { NoteQueries } from '../../../application/notes/queries.js';
import { TITLE_MAX_LENGTH, titleLength } from '../../../domain/notes/note.js';
import { currentUser, requireAuth } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/notes:
 *   post:
 *     tags: [Notes]
 *     summary: Create a note
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title]
 *             properties:
 *               title: { type: string, minLength: 1, maxLength: 200 }
 *               content: { type: string, nullable: true }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Note' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Notes]
 *     summary: List own notes
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: search
 *         description: Case-insensitive substring of the title
 *         schema: { type: string }
 *       - in: query
 *         name: sort
 *         schema: { type: string, enum: [created, -created, title, -title], default: -created }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 100, default: 20 }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/Note' }
 *       400:
 *         description: Invalid sort key or limit
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/notes/{id}:
 *   get:
 *     tags: [Notes]
 *     summary: Get a note
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Note' }
 *       404:
 *         description: Note not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Notes]
 *     summary: Update title and/or content
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               title: { type: string, minLength: 1, maxLength: 200 }
 *               content: { type: string, nullable: true }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Note' }
 *       404:
 *         description: Note not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Notes]
 *     summary: Delete a note
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: Deleted }
 *       404:
 *         description: Note not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const noteParamsSchema = z.object({
  id: z.string().uuid(),
});

const titleSchema = z
  .string()
  .min(1)
  .refine((title) => titleLength(title) <= TITLE_MAX_LENGTH, {
    message: `String must contain at most ${TITLE_MAX_LENGTH} character(s)`,
  });

const createNoteBodySchema = z.object({
  title: titleSchema,
  content: z.string().nullable().optional(),
});

const updateNoteBodySchema = z.object({
  title: titleSchema.optional(),
  content: z.string().nullable().optional(),
});

// sort and limit are checked by the query layer so they report INVALID_ARGUMENT
const listNotesQuerySchema = z.object({
  search: z.string().optional(),
  sort: z.string().optional(),
  limit: z.string().optional(),
});

export interface NoteRoutesDeps {
  authGate: AuthGate;
  createNoteUseCase: CreateNoteUseCase;
  updateNoteUseCase: UpdateNoteUseCase;
  deleteNoteUseCase: DeleteNoteUseCase;
  queries: NoteQueries;
}

export function createNoteRoutes(deps: NoteRoutesDeps) {
  const router = Router();

  // All routes require authentication
  router.use(requireAuth(deps.authGate));

  // Create note
  router.post(
    '/',
    validate({ body: createNoteBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createNoteBodySchema.parse(req.body);
      const note = await deps.createNoteUseCase.execute({
        ownerId: currentUser(req).id,
        title: body.title,
        content: body.content,
      });
      res.status(201).json(note);
    })
  );

  // List notes
  router.get(
    '/',
    validate({ query: listNotesQuerySchema }),
    asyncHandler(async (req, res) => {
      const query = listNotesQuerySchema.parse(req.query);
      const notes = await deps.queries.listNotes(currentUser(req).id, query);
      res.json(notes);
    })
  );

  // Get note
  router.get(
    '/:id',
    validate({ params: noteParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = noteParamsSchema.parse(req.params);
      const note = await deps.queries.getNote(id, currentUser(req).id);
      res.json(note);
    })
  );

  // Update note
  router.patch(
    '/:id',
    validate({ params: noteParamsSchema, body: updateNoteBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = noteParamsSchema.parse(req.params);
      const body = updateNoteBodySchema.parse(req.body);
      const note = await deps.updateNoteUseCase.execute({
        noteId: id,
        ownerId: currentUser(req).id,
        title: body.title,
        content: body.content,
      });
      res.json(note);
    })
  );

  // Delete note
  router.delete(
    '/:id',
    validate({ params: noteParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = noteParamsSchema.parse(req.params);
      const result = await deps.deleteNoteUseCase.execute({
        noteId: id,
        ownerId: currentUser(req).id,
      });
      res.json(result);
    })
  );

  return router;
}
