import {
  DEFAULT_PAGE_LIMIT,
  MAX_TODO_ID,
  type Todo,
  type TodoPage,
  type TodoRepository,
  type TodoStatus,
} from '../../domain/todo/todo.js';
import { NotFoundError } from '../errors.js';

/**
 * Same error whether the todo is missing or belongs to someone else.
 */
export function todoNotFound(todoId: number): NotFoundError {
  return new NotFoundError(`Todo with id ${todoId} not found`);
}

/**
 * Ids past the column range can never match a row, so they are rejected
 * before reaching the repository.
 */
export function assertTodoIdInRange(todoId: number): void {
  if (todoId > MAX_TODO_ID) {
    throw todoNotFound(todoId);
  }
}

export interface ListTodosOptions {
  status?: TodoStatus;
  skip?: number;
  limit?: number;
}

export class TodoQueries {
  constructor(private todoRepo: TodoRepository) {}

  async getTodo(userId: number, todoId: number): Promise<Todo> {
    assertTodoIdInRange(todoId);
    const todo = await this.todoRepo.findById(userId, todoId);
    if (!todo) {
      throw todoNotFound(todoId);
    }
    return todo;
  }

  async listTodos(userId: number, options: ListTodosOptions = {}): Promise<TodoPage> {
    return this.todoRepo.list(userId, {
      status: options.status,
      skip: options.skip ?? 0,
      limit: options.limit ?? DEFAULT_PAGE_LIMIT,
    });
  }
}
