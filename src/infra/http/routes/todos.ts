import { Router } from 'express';
import { CreateTodoUseCase } from '../../../application/todos/createTodo.js';
import { DeleteTodoUseCase } from '../../../application/todos/deleteTodo.js';
import { TodoQueries } from '../../../application/todos/queries.js';
import { UpdateTodoUseCase } from '../../../application/todos/updateTodo.js';
import type { TokenService } from '../../../application/auth/tokenService.js';
import type { UserRepository } from '../../../domain/auth/user.js';
import type { TodoPatch, TodoRepository } from '../../../domain/todo/todo.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { authMiddleware, currentUser, type AuthRequest } from '../middleware/auth.js';
import { toTodoListResponse, toTodoResponse } from '../presenters.js';
import {
  createTodoBodySchema,
  listTodosQuerySchema,
  todoIdParamsSchema,
  updateTodoBodySchema,
  type UpdateTodoBody,
} from '../schemas.js';

/**
 * @openapi
 * /todos/:
 *   post:
 *     tags: [Todos]
 *     summary: Create a todo
 *     description: Status always starts as Pending.
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [title, description]
 *             properties:
 *               title: { type: string, minLength: 1, maxLength: 60 }
 *               description: { type: string, minLength: 1 }
 *               due_date: { type: string, format: date-time, description: Must be in the future }
 *     responses:
 *       201:
 *         description: Created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Todo' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Todos]
 *     summary: List the caller's todos
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: status_filter
 *         schema: { type: string, enum: [Pending, Done, Cancelled] }
 *       - in: query
 *         name: skip
 *         schema: { type: integer, minimum: 0, default: 0 }
 *       - in: query
 *         name: limit
 *         schema: { type: integer, minimum: 1, maximum: 1000, default: 100 }
 *     responses:
 *       200:
 *         description: Page of todos plus the filtered total
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TodoList' }
 *       401:
 *         description: Unauthorized
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /todos/{id}:
 *   get:
 *     tags: [Todos]
 *     summary: Get a todo
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Todo' }
 *       404:
 *         description: Todo not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Todos]
 *     summary: Partially update a todo
 *     description: Only the fields present in the body are changed. A null due_date clears it.
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               title: { type: string, minLength: 1, maxLength: 60 }
 *               description: { type: string, minLength: 1 }
 *               status: { type: string, enum: [Pending, Done, Cancelled] }
 *               due_date: { type: string, format: date-time, nullable: true }
 *     responses:
 *       200:
 *         description: Updated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/Todo' }
 *       404:
 *         description: Todo not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       422:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Todos]
 *     summary: Delete a todo
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       204:
 *         description: Deleted
 *       404:
 *         description: Todo not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

export interface TodoRoutesDeps {
  users: UserRepository;
  todos: TodoRepository;
  tokens: TokenService;
}

function toPatch(body: UpdateTodoBody): TodoPatch {
  return {
    title: body.title,
    description: body.description,
    status: body.status,
    dueDate: body.due_date,
  };
}

export function createTodoRoutes({ users, todos, tokens }: TodoRoutesDeps) {
  const router = Router();
  const createTodoUseCase = new CreateTodoUseCase(todos);
  const updateTodoUseCase = new UpdateTodoUseCase(todos);
  const deleteTodoUseCase = new DeleteTodoUseCase(todos);
  const queries = new TodoQueries(todos);

  // All routes require authentication
  router.use(authMiddleware({ tokens, users }));

  router.post(
    '/',
    asyncHandler(async (req: AuthRequest, res) => {
      const body = createTodoBodySchema.parse(req.body);
      const todo = await createTodoUseCase.execute({
        userId: currentUser(req).id,
        title: body.title,
        description: body.description,
        dueDate: body.due_date,
      });
      res.status(201).json(toTodoResponse(todo));
    })
  );

  router.get(
    '/',
    asyncHandler(async (req: AuthRequest, res) => {
      const query = listTodosQuerySchema.parse(req.query);
      const page = await queries.listTodos(currentUser(req).id, {
        status: query.status_filter,
        skip: query.skip,
        limit: query.limit,
      });
      res.json(toTodoListResponse(page));
    })
  );

  router.get(
    '/:id',
    asyncHandler(async (req: AuthRequest, res) => {
      const { id } = todoIdParamsSchema.parse(req.params);
      const todo = await queries.getTodo(currentUser(req).id, id);
      res.json(toTodoResponse(todo));
    })
  );

  router.put(
    '/:id',
    asyncHandler(async (req: AuthRequest, res) => {
      const { id } = todoIdParamsSchema.parse(req.params);
      const body = updateTodoBodySchema.parse(req.body);
      const todo = await updateTodoUseCase.execute({
        userId: currentUser(req).id,
        todoId: id,
        patch: toPatch(body),
      });
      res.json(toTodoResponse(todo));
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req: AuthRequest, res) => {
      const { id } = todoIdParamsSchema.parse(req.params);
      await deleteTodoUseCase.execute({ userId: currentUser(req).id, todoId: id });
      res.status(204).end();
    })
  );

  return router;
}
