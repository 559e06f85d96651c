import type { User } from '../../domain/auth/user.js';
import type { Todo, TodoPage } from '../../domain/todo/todo.js';

export interface UserResponse {
  id: number;
  email: string;
  username: string;
  is_active: boolean;
  created_at: string;
}

export interface TodoResponse {
  id: number;
  title: string;
  description: string;
  status: Todo['status'];
  due_date: string | null;
  created_at: string;
  updated_at: string;
}

export interface TodoListResponse {
  todos: TodoResponse[];
  total: number;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    is_active: user.isActive,
    created_at: user.createdAt.toISOString(),
  };
}

export function toTodoResponse(todo: Todo): TodoResponse {
  return {
    id: todo.id,
    title: todo.title,
    description: todo.description,
    status: todo.status,
    due_date: todo.dueDate ? todo.dueDate.toISOString() : null,
    created_at: todo.createdAt.toISOString(),
    updated_at: todo.updatedAt.toISOString(),
  };
}

export function toTodoListResponse(page: TodoPage): TodoListResponse {
  return {
    todos: page.todos.map(toTodoResponse),
    total: page.total,
  };
}
