import type { TodoRepository } from '../../domain/todo/todo.js';
import { assertTodoIdInRange, todoNotFound } from './queries.js';

export interface DeleteTodoCommand {
  userId: number;
  todoId: number;
}

export class DeleteTodoUseCase {
  constructor(private todoRepo: TodoRepository) {}

  async execute(command: DeleteTodoCommand): Promise<void> {
    assertTodoIdInRange(command.todoId);
    const deleted = await this.todoRepo.delete(command.userId, command.todoId);
    if (!deleted) {
      throw todoNotFound(command.todoId);
    }
  }
}
