export const TODO_STATUSES = ['Pending', 'Done', 'Cancelled'] as const;

export type TodoStatus = (typeof TODO_STATUSES)[number];

/**
 * Todo item. Only ever read or written through its owner's id.
 */
export interface Todo {
  readonly id: number;
  readonly userId: number;
  readonly title: string;
  readonly description: string;
  readonly status: TodoStatus;
  readonly dueDate: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewTodo {
  title: string;
  description: string;
  dueDate?: Date;
}

/**
 * Partial update. A field is applied iff it is present (not undefined);
 * `dueDate: null` clears the due date.
 */
export interface TodoPatch {
  title?: string;
  description?: string;
  status?: TodoStatus;
  dueDate?: Date | null;
}

export interface TodoListQuery {
  status?: TodoStatus;
  skip: number;
  limit: number;
}

export interface TodoPage {
  todos: Todo[];
  /** Size of the filtered set before skip/limit are applied. */
  total: number;
}

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 1000;

/** Largest id the `todos.id` INT column can hold. */
export const MAX_TODO_ID = 2147483647;

/**
 * Storage port for todos. Every method is scoped by the owner id; there is no
 * unscoped lookup.
 */
export interface TodoRepository {
  /** Inserts with status Pending. */
  create(ownerId: number, todo: NewTodo): Promise<Todo>;
  findById(ownerId: number, todoId: number): Promise<Todo | null>;
  list(ownerId: number, query: TodoListQuery): Promise<TodoPage>;
  /** Applies the patch and refreshes updatedAt, even for an empty patch. */
  update(ownerId: number, todoId: number, patch: TodoPatch): Promise<Todo | null>;
  delete(ownerId: number, todoId: number): Promise<boolean>;
}
