import { ConflictError } from '../application/errors.js';
import type { NewUser, User, UserRepository } from '../domain/auth/user.js';
import type {
  NewTodo,
  Todo,
  TodoListQuery,
  TodoPage,
  TodoPatch,
  TodoRepository,
} from '../domain/todo/todo.js';

/**
 * Shared in-process tables so the user and todo fakes see each other,
 * the way the two pg repositories share one database.
 */
export class InMemoryDatabase {
  readonly users = new Map<number, User>();
  readonly todos = new Map<number, Todo>();
  private nextUserId = 1;
  private nextTodoId = 1;

  allocateUserId(): number {
    return this.nextUserId++;
  }

  allocateTodoId(): number {
    return this.nextTodoId++;
  }
}

export class InMemoryUserRepo implements UserRepository {
  constructor(private db: InMemoryDatabase) {}

  async findById(id: number): Promise<User | null> {
    return this.db.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return [...this.db.users.values()].find((u) => u.email === email) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return [...this.db.users.values()].find((u) => u.username === username) ?? null;
  }

  async create(user: NewUser): Promise<User> {
    if (await this.findByEmail(user.email)) {
      throw new ConflictError('Email already registered');
    }
    if (await this.findByUsername(user.username)) {
      throw new ConflictError('Username already taken');
    }

    const now = new Date();
    const created: User = {
      id: this.db.allocateUserId(),
      email: user.email,
      username: user.username,
      passwordHash: user.passwordHash,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.db.users.set(created.id, created);
    return created;
  }

  async setActive(id: number, isActive: boolean): Promise<User | null> {
    const existing = this.db.users.get(id);
    if (!existing) {
      return null;
    }
    const updated: User = { ...existing, isActive, updatedAt: new Date() };
    this.db.users.set(id, updated);
    return updated;
  }

  async delete(id: number): Promise<boolean> {
    if (!this.db.users.delete(id)) {
      return false;
    }
    for (const todo of [...this.db.todos.values()]) {
      if (todo.userId === id) {
        this.db.todos.delete(todo.id);
      }
    }
    return true;
  }
}

export class InMemoryTodoRepo implements TodoRepository {
  constructor(private db: InMemoryDatabase) {}

  async create(ownerId: number, todo: NewTodo): Promise<Todo> {
    const now = new Date();
    const created: Todo = {
      id: this.db.allocateTodoId(),
      userId: ownerId,
      title: todo.title,
      description: todo.description,
      status: 'Pending',
      dueDate: todo.dueDate ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.db.todos.set(created.id, created);
    return created;
  }

  async findById(ownerId: number, todoId: number): Promise<Todo | null> {
    const todo = this.db.todos.get(todoId);
    return todo && todo.userId === ownerId ? todo : null;
  }

  async list(ownerId: number, query: TodoListQuery): Promise<TodoPage> {
    const filtered = [...this.db.todos.values()]
      .filter((t) => t.userId === ownerId)
      .filter((t) => !query.status || t.status === query.status)
      .sort((a, b) => a.id - b.id);

    return {
      todos: filtered.slice(query.skip, query.skip + query.limit),
      total: filtered.length,
    };
  }

  async update(ownerId: number, todoId: number, patch: TodoPatch): Promise<Todo | null> {
    const existing = await this.findById(ownerId, todoId);
    if (!existing) {
      return null;
    }

    const updated: Todo = {
      ...existing,
      title: patch.title ?? existing.title,
      description: patch.description ?? existing.description,
      status: patch.status ?? existing.status,
      dueDate: patch.dueDate === undefined ? existing.dueDate : patch.dueDate,
      updatedAt: new Date(),
    };
    this.db.todos.set(todoId, updated);
    return updated;
  }

  async delete(ownerId: number, todoId: number): Promise<boolean> {
    const existing = await this.findById(ownerId, todoId);
    if (!existing) {
      return false;
    }
    return this.db.todos.delete(todoId);
  }
}

export function createInMemoryRepos() {
  const db = new InMemoryDatabase();
  return {
    db,
    users: new InMemoryUserRepo(db),
    todos: new InMemoryTodoRepo(db),
  };
}
