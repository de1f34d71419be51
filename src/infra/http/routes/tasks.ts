import { Router } from 'express';
import { z } from 'zod';
import { SORT_FIELDS, parseOrdering } from '../../../domain/tasks/taskQuery.js';
import { IdentityResolver } from '../../../application/auth/identityResolver.js';
import { CreateTaskUseCase } from '../../../application/tasks/createTask.js';
import { UpdateTaskUseCase } from '../../../application/tasks/updateTask.js';
import { DeleteTaskUseCase } from '../../../application/tasks/deleteTask.js';
import { TaskQueries } from '../../../application/tasks/queries.js';
import { TaskRepository } from '../../../application/repositories.js';
import { authMiddleware, requireCaller } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/tasks:
 *   get:
 *     tags: [Tasks]
 *     summary: List visible tasks (own tasks, or every task for admins)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - { in: query, name: completed, schema: { type: boolean } }
 *       - { in: query, name: title, schema: { type: string }, description: Case-insensitive title substring }
 *       - { in: query, name: search, schema: { type: string }, description: Terms matched against title and description }
 *       - { in: query, name: createdFrom, schema: { type: string }, description: Inclusive lower bound (date or date-time) }
 *       - { in: query, name: createdTo, schema: { type: string }, description: Inclusive upper bound (date or date-time) }
 *       - { in: query, name: ordering, schema: { type: string, example: -createdAt } }
 *       - { in: query, name: page, schema: { type: integer, minimum: 1 } }
 *     responses:
 *       200:
 *         description: One page of tasks
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 count: { type: integer }
 *                 next: { type: integer, nullable: true }
 *                 previous: { type: integer, nullable: true }
 *                 results:
 *                   type: array
 *                   items: { $ref: '#/components/schemas/Task' }
 *       400:
 *         description: Invalid query parameter
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Tasks]
 *     summary: Create a task owned by the caller
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title]
 *             properties:
 *               title: { type: string }
 *               description: { type: string, nullable: true }
 *               completed: { type: boolean }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Task' }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/tasks/stats:
 *   get:
 *     tags: [Tasks]
 *     summary: Completion statistics over the visible tasks
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: Statistics
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 total: { type: integer }
 *                 completed: { type: integer }
 *                 pending: { type: integer }
 *                 completionRate: { type: number, example: 66.67 }
 *
 * /api/tasks/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: string, format: uuid }
 *   get:
 *     tags: [Tasks]
 *     summary: Get a task
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Task' }
 *       404:
 *         description: Task not found or not accessible
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Tasks]
 *     summary: Update a task (title required)
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title]
 *             properties:
 *               title: { type: string }
 *               description: { type: string, nullable: true }
 *               completed: { type: boolean }
 *     responses:
 *       200: { description: Updated }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Task not found or not accessible
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   patch:
 *     tags: [Tasks]
 *     summary: Update some of a task's fields
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               title: { type: string }
 *               description: { type: string, nullable: true }
 *               completed: { type: boolean }
 *     responses:
 *       200: { description: Updated }
 *       404:
 *         description: Task not found or not accessible
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Tasks]
 *     summary: Delete a task
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       204: { description: Deleted }
 *       404:
 *         description: Task not found or not accessible
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const isoDateTime = z.string().datetime({ offset: true });

/**
 * Date or date-time query bound. A bare date covers the whole UTC day, so
 * `createdTo=2024-01-31` includes tasks created on the 31st.
 */
function dateBound(edge: 'start' | 'end') {
  return z.string().transform((value, ctx) => {
    let date: Date;
    if (DATE_ONLY.test(value)) {
      date = new Date(`${value}T${edge === 'start' ? '00:00:00.000' : '23:59:59.999'}Z`);
    } else if (isoDateTime.safeParse(value).success) {
      date = new Date(value);
    } else {
      date = new Date(NaN);
    }

    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected a date (YYYY-MM-DD) or an ISO 8601 date-time',
      });
      return z.NEVER;
    }
    return date;
  });
}

const booleanParam = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// An empty text filter is ignored rather than rejected
const blankAsAbsent = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value : undefined));

const listTasksQuerySchema = z.object({
  completed: booleanParam.optional(),
  title: blankAsAbsent,
  search: blankAsAbsent,
  createdFrom: dateBound('start').optional(),
  createdTo: dateBound('end').optional(),
  ordering: z
    .string()
    .transform((value, ctx) => {
      const sort = parseOrdering(value);
      if (!sort) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Ordering must be one of ${SORT_FIELDS.join(', ')}, optionally prefixed with '-'`,
        });
        return z.NEVER;
      }
      return sort;
    })
    .optional(),
  page: z.coerce.number().int().min(1).default(1),
});

const taskParamsSchema = z.object({
  id: z.string().min(1),
});

const taskBodySchema = z.object({
  title: z.string(),
  description: z.string().nullable().optional(),
  completed: z.boolean().optional(),
});

const patchTaskBodySchema = taskBodySchema.partial();

export interface TaskRouteDependencies {
  tasks: TaskRepository;
  resolver: IdentityResolver;
  pageSize: number;
}

export function createTaskRoutes(deps: TaskRouteDependencies) {
  const router = Router();
  const createTaskUseCase = new CreateTaskUseCase(deps.tasks);
  const updateTaskUseCase = new UpdateTaskUseCase(deps.tasks);
  const deleteTaskUseCase = new DeleteTaskUseCase(deps.tasks);
  const queries = new TaskQueries(deps.tasks, deps.pageSize);

  // All routes require authentication
  router.use(authMiddleware(deps.resolver));

  // List tasks
  router.get(
    '/',
    validate({ query: listTasksQuerySchema }),
    asyncHandler(async (req, res) => {
      const { page, ordering, ...filters } = listTasksQuerySchema.parse(req.query);
      const result = await queries.listVisible(requireCaller(req), filters, ordering, page);
      res.json(result);
    })
  );

  // Create task
  router.post(
    '/',
    validate({ body: taskBodySchema }),
    asyncHandler(async (req, res) => {
      const body = taskBodySchema.parse(req.body);
      const task = await createTaskUseCase.execute(requireCaller(req), body);
      res.status(201).json(task);
    })
  );

  // Statistics (registered before /:id)
  router.get(
    '/stats',
    asyncHandler(async (req, res) => {
      const stats = await queries.stats(requireCaller(req));
      res.json(stats);
    })
  );

  // Get task
  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = taskParamsSchema.parse(req.params);
      const task = await queries.getTask(requireCaller(req), id);
      res.json(task);
    })
  );

  // Update with title required; omitted optional fields keep their values
  router.put(
    '/:id',
    validate({ body: taskBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = taskParamsSchema.parse(req.params);
      const body = taskBodySchema.parse(req.body);
      const task = await updateTaskUseCase.execute(requireCaller(req), id, body);
      res.json(task);
    })
  );

  // Partial update
  router.patch(
    '/:id',
    validate({ body: patchTaskBodySchema }),
    asyncHandler(async (req, res) => {
      const { id } = taskParamsSchema.parse(req.params);
      const body = patchTaskBodySchema.parse(req.body);
      const task = await updateTaskUseCase.execute(requireCaller(req), id, body);
      res.json(task);
    })
  );

  // Delete task
  router.delete(
    '/:id',
    asyncHandler(async (req, res) => {
      const { id } = taskParamsSchema.parse(req.params);
      await deleteTaskUseCase.execute(requireCaller(req), id);
      res.status(204).end();
    })
  );

  return router;
}
