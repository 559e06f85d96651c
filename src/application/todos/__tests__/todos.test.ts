import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CreateTodoUseCase } from '../createTodo.js';
import { UpdateTodoUseCase } from '../updateTodo.js';
import { DeleteTodoUseCase } from '../deleteTodo.js';
import { TodoQueries } from '../queries.js';
import { NotFoundError } from '../../errors.js';
import type { User } from '../../../domain/auth/user.js';
import {
  createInMemoryRepos,
  InMemoryTodoRepo,
  InMemoryUserRepo,
} from '../../../test-utils/inMemoryRepos.js';

describe('Todo use cases', () => {
  let users: InMemoryUserRepo;
  let todos: InMemoryTodoRepo;
  let createTodo: CreateTodoUseCase;
  let updateTodo: UpdateTodoUseCase;
  let deleteTodo: DeleteTodoUseCase;
  let queries: TodoQueries;
  let alice: User;
  let bob: User;

  beforeEach(async () => {
    ({ users, todos } = createInMemoryRepos());
    createTodo = new CreateTodoUseCase(todos);
    updateTodo = new UpdateTodoUseCase(todos);
    deleteTodo = new DeleteTodoUseCase(todos);
    queries = new TodoQueries(todos);

    alice = await users.create({ email: 'alice@example.com', username: 'alice', passwordHash: 'hash' });
    bob = await users.create({ email: 'bob@example.com', username: 'bob', passwordHash: 'hash' });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('CreateTodoUseCase', () => {
    it('should create a Pending todo owned by the caller', async () => {
      const dueDate = new Date('2099-05-01T12:00:00Z');
      const todo = await createTodo.execute({
        userId: alice.id,
        title: 'Buy groceries',
        description: 'Milk, eggs, bread',
        dueDate,
      });

      expect(todo).toMatchObject({
        id: 1,
        userId: alice.id,
        title: 'Buy groceries',
        description: 'Milk, eggs, bread',
        status: 'Pending',
        dueDate,
      });
      expect(todo.createdAt).toEqual(todo.updatedAt);
    });

    it('should leave the due date empty when none is given', async () => {
      const todo = await createTodo.execute({ userId: alice.id, title: 'T', description: 'D' });

      expect(todo.dueDate).toBeNull();
    });
  });

  describe('TodoQueries.getTodo', () => {
    it('should return the caller own todo', async () => {
      const created = await createTodo.execute({ userId: alice.id, title: 'T', description: 'D' });

      expect(await queries.getTodo(alice.id, created.id)).toEqual(created);
    });

    it('should not reveal another user todo', async () => {
      const created = await createTodo.execute({ userId: alice.id, title: 'T', description: 'D' });

      await expect(queries.getTodo(bob.id, created.id)).rejects.toThrow(
        new NotFoundError(`Todo with id ${created.id} not found`)
      );
    });

    it('should fail the same way for a missing id', async () => {
      await expect(queries.getTodo(alice.id, 999)).rejects.toThrow(
        new NotFoundError('Todo with id 999 not found')
      );
    });
  });

  describe('TodoQueries.listTodos', () => {
    beforeEach(async () => {
      for (let i = 1; i <= 5; i++) {
        await createTodo.execute({ userId: alice.id, title: `Task ${i}`, description: 'D' });
      }
      await createTodo.execute({ userId: bob.id, title: 'Bob task', description: 'D' });
    });

    it('should list only the caller todos with defaults', async () => {
      const page = await queries.listTodos(alice.id);

      expect(page.total).toBe(5);
      expect(page.todos.map((t) => t.title)).toEqual([
        'Task 1',
        'Task 2',
        'Task 3',
        'Task 4',
        'Task 5',
      ]);
    });

    it('should paginate while reporting the unpaginated total', async () => {
      const page = await queries.listTodos(alice.id, { skip: 1, limit: 2 });

      expect(page.total).toBe(5);
      expect(page.todos.map((t) => t.title)).toEqual(['Task 2', 'Task 3']);
    });

    it('should return an empty page past the end with the same total', async () => {
      const page = await queries.listTodos(alice.id, { skip: 10, limit: 2 });

      expect(page).toEqual({ todos: [], total: 5 });
    });

    it('should filter by status before counting', async () => {
      await updateTodo.execute({ userId: alice.id, todoId: 2, patch: { status: 'Done' } });
      await updateTodo.execute({ userId: alice.id, todoId: 4, patch: { status: 'Done' } });

      const done = await queries.listTodos(alice.id, { status: 'Done', limit: 1 });
      const cancelled = await queries.listTodos(alice.id, { status: 'Cancelled' });

      expect(done.total).toBe(2);
      expect(done.todos.map((t) => t.id)).toEqual([2]);
      expect(cancelled).toEqual({ todos: [], total: 0 });
    });
  });

  describe('UpdateTodoUseCase', () => {
    it('should apply only the fields present in the patch', async () => {
      const dueDate = new Date('2099-01-01T00:00:00Z');
      const created = await createTodo.execute({
        userId: alice.id,
        title: 'Original',
        description: 'Original description',
        dueDate,
      });

      const updated = await updateTodo.execute({
        userId: alice.id,
        todoId: created.id,
        patch: { status: 'Done' },
      });

      expect(updated).toMatchObject({
        title: 'Original',
        description: 'Original description',
        status: 'Done',
        dueDate,
      });
    });

    it('should clear the due date when it is explicitly null', async () => {
      const created = await createTodo.execute({
        userId: alice.id,
        title: 'T',
        description: 'D',
        dueDate: new Date('2099-01-01T00:00:00Z'),
      });

      const updated = await updateTodo.execute({
        userId: alice.id,
        todoId: created.id,
        patch: { dueDate: null },
      });

      expect(updated.dueDate).toBeNull();
    });

    it('should refresh updatedAt but keep every field for an empty patch', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2030-01-01T00:00:00Z'));
      const created = await createTodo.execute({ userId: alice.id, title: 'T', description: 'D' });

      vi.setSystemTime(new Date('2030-01-01T00:05:00Z'));
      const updated = await updateTodo.execute({ userId: alice.id, todoId: created.id, patch: {} });

      expect(updated).toEqual({
        ...created,
        updatedAt: new Date('2030-01-01T00:05:00Z'),
      });
    });

    it('should not update another user todo', async () => {
      const created = await createTodo.execute({ userId: alice.id, title: 'T', description: 'D' });

      await expect(
        updateTodo.execute({ userId: bob.id, todoId: created.id, patch: { title: 'Hijacked' } })
      ).rejects.toThrow(NotFoundError);
      expect((await queries.getTodo(alice.id, created.id)).title).toBe('T');
    });
  });

  describe('DeleteTodoUseCase', () => {
    it('should remove the todo permanently', async () => {
      const created = await createTodo.execute({ userId: alice.id, title: 'T', description: 'D' });

      await deleteTodo.execute({ userId: alice.id, todoId: created.id });

      await expect(queries.getTodo(alice.id, created.id)).rejects.toThrow(NotFoundError);
      await expect(deleteTodo.execute({ userId: alice.id, todoId: created.id })).rejects.toThrow(
        NotFoundError
      );
    });

    it('should not delete another user todo', async () => {
      const created = await createTodo.execute({ userId: alice.id, title: 'T', description: 'D' });

      await expect(deleteTodo.execute({ userId: bob.id, todoId: created.id })).rejects.toThrow(
        `Todo with id ${created.id} not found`
      );
      expect(await queries.getTodo(alice.id, created.id)).toEqual(created);
    });
  });

  describe('deleting a user', () => {
    it('should cascade to every todo the user owns', async () => {
      const first = await createTodo.execute({ userId: alice.id, title: 'A1', description: 'D' });
      await createTodo.execute({ userId: alice.id, title: 'A2', description: 'D' });
      const bobs = await createTodo.execute({ userId: bob.id, title: 'B1', description: 'D' });

      expect(await users.delete(alice.id)).toBe(true);

      expect(await queries.listTodos(alice.id)).toEqual({ todos: [], total: 0 });
      await expect(queries.getTodo(alice.id, first.id)).rejects.toThrow(NotFoundError);
      await expect(
        updateTodo.execute({ userId: alice.id, todoId: first.id, patch: {} })
      ).rejects.toThrow(NotFoundError);
      await expect(deleteTodo.execute({ userId: alice.id, todoId: first.id })).rejects.toThrow(
        NotFoundError
      );
      expect(await queries.getTodo(bob.id, bobs.id)).toEqual(bobs);
    });
  });

  describe('ids beyond the storable range', () => {
    it('should answer NotFound without querying the repository', async () => {
      const findById = vi.spyOn(todos, 'findById');
      const update = vi.spyOn(todos, 'update');
      const remove = vi.spyOn(todos, 'delete');

      await expect(queries.getTodo(alice.id, 3000000000)).rejects.toThrow(
        new NotFoundError('Todo with id 3000000000 not found')
      );
      await expect(
        updateTodo.execute({ userId: alice.id, todoId: 3000000000, patch: { title: 'X' } })
      ).rejects.toThrow(NotFoundError);
      await expect(deleteTodo.execute({ userId: alice.id, todoId: 3000000000 })).rejects.toThrow(
        NotFoundError
      );

      expect(findById).not.toHaveBeenCalled();
      expect(update).not.toHaveBeenCalled();
      expect(remove).not.toHaveBeenCalled();
    });

    it('should still look up the largest storable id', async () => {
      const findById = vi.spyOn(todos, 'findById');

      await expect(queries.getTodo(alice.id, 2147483647)).rejects.toThrow(NotFoundError);

      expect(findById).toHaveBeenCalledWith(alice.id, 2147483647);
    });
  });
});
