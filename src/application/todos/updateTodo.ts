import type { Todo, TodoPatch, TodoRepository } from '../../domain/todo/todo.js';
import { assertTodoIdInRange, todoNotFound } from './queries.js';

export interface UpdateTodoCommand {
  userId: number;
  todoId: number;
  patch: TodoPatch;
}

export class UpdateTodoUseCase {
  constructor(private todoRepo: TodoRepository) {}

  async execute(command: UpdateTodoCommand): Promise<Todo> {
    assertTodoIdInRange(command.todoId);
    const updated = await this.todoRepo.update(command.userId, command.todoId, command.patch);
    if (!updated) {
      throw todoNotFound(command.todoId);
    }
    return updated;
  }
}
