import { Router } from 'express';
import { z } from 'zod';
import type { BoardService } from '../../../application/board/boardService.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /boards:
 *   get:
 *     tags: [Boards]
 *     summary: List boards, newest first
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Boards
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 data:
 *                   type: array
 *                   items:
 *                     $ref: '#/components/schemas/Board'
 *       401:
 *         description: Missing or invalid token
 *   post:
 *     tags: [Boards]
 *     summary: Create a board
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/BoardInput'
 *     responses:
 *       201:
 *         description: Board created
 *       400:
 *         description: Invalid body or empty title
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /boards/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: string }
 *   get:
 *     tags: [Boards]
 *     summary: Get a board
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Board
 *       404:
 *         description: Board not found
 *   put:
 *     tags: [Boards]
 *     summary: Rename a board
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/BoardInput'
 *     responses:
 *       200:
 *         description: Board updated
 *       400:
 *         description: Invalid body or empty title
 *       404:
 *         description: Board not found
 *   delete:
 *     tags: [Boards]
 *     summary: Delete a board
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       204:
 *         description: Board deleted
 *       404:
 *         description: Board not found
 */

const boardParamsSchema = z.object({
  id: z.string().min(1),
});

const boardBodySchema = z.object({
  title: z.string(),
});

/**
 * Board CRUD. Mount behind authMiddleware.
 */
export function createBoardRoutes(boards: BoardService) {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json({ data: await boards.listBoards() });
    })
  );

  router.post(
    '/',
    validate({ body: boardBodySchema }),
    asyncHandler(async (req, res) => {
      const { title } = boardBodySchema.parse(req.body);
      res.status(201).json({ data: await boards.createBoard(title) });
    })
  );

  router.get(
    '/:id',
    validate({ params: boardParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = boardParamsSchema.parse(req.params);
      res.json({ data: await boards.getBoard(id) });
    })
  );

  router.put(
    '/:id',
    validate({ params: boardParamsSchema, body: boardBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = boardParamsSchema.parse(req.params);
      const { title } = boardBodySchema.parse(req.body);
      res.json({ data: await boards.updateBoard(id, title) });
    })
  );

  router.delete(
    '/:id',
    validate({ params: boardParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = boardParamsSchema.parse(req.params);
      await boards.deleteBoard(id);
      res.status(204).end();
    })
  );

  return router;
}
