import type { Todo, TodoRepository } from '../../domain/todo/todo.js';

export interface CreateTodoCommand {
  userId: number;
  title: string;
  description: string;
  dueDate?: Date;
}

export class CreateTodoUseCase {
  constructor(private todoRepo: TodoRepository) {}

  async execute(command: CreateTodoCommand): Promise<Todo> {
    // Status is not part of the command: new todos always start as Pending
    return this.todoRepo.create(command.userId, {
      title: command.title,
      description: command.description,
      dueDate: command.dueDate,
    });
  }
}
