import type {
  NewTodo,
  Todo,
  TodoListQuery,
  TodoPage,
  TodoPatch,
  TodoRepository,
  TodoStatus,
} from '../../domain/todo/todo.js';
import type { DbPool } from './pool.js';

type TodoRow = {
  id: number;
  user_id: number;
  title: string;
  description: string;
  status: TodoStatus;
  due_date: Date | null;
  created_at: Date;
  updated_at: Date;
};

const TODO_COLUMNS =
  'id, user_id, title, description, status, due_date, created_at, updated_at';

function toTodo(row: TodoRow): Todo {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    description: row.description,
    status: row.status,
    dueDate: row.due_date,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const PATCH_COLUMNS: ReadonlyArray<readonly [keyof TodoPatch, string]> = [
  ['title', 'title'],
  ['description', 'description'],
  ['status', 'status'],
  ['dueDate', 'due_date'],
];

/**
 * Build the SET list for a patch: one assignment per present field, plus
 * updated_at which is always refreshed. Placeholders start after the two
 * scoping parameters ($1 todo id, $2 owner id).
 */
export function buildPatchAssignments(patch: TodoPatch): { assignments: string[]; values: unknown[] } {
  const assignments: string[] = [];
  const values: unknown[] = [];

  for (const [field, column] of PATCH_COLUMNS) {
    const value = patch[field];
    if (value === undefined) {
      continue;
    }
    values.push(value);
    assignments.push(`${column} = $${values.length + 2}`);
  }

  assignments.push('updated_at = NOW()');
  return { assignments, values };
}

export class TodoRepo implements TodoRepository {
  constructor(private pool: DbPool) {}

  async create(ownerId: number, todo: NewTodo): Promise<Todo> {
    const result = await this.pool.query<TodoRow>(
      `INSERT INTO todos (user_id, title, description, status, due_date)
       VALUES ($1, $2, $3, 'Pending', $4)
       RETURNING ${TODO_COLUMNS}`,
      [ownerId, todo.title, todo.description, todo.dueDate ?? null]
    );
    return toTodo(result.rows[0]);
  }

  async findById(ownerId: number, todoId: number): Promise<Todo | null> {
    const result = await this.pool.query<TodoRow>(
      `SELECT ${TODO_COLUMNS} FROM todos WHERE id = $1 AND user_id = $2`,
      [todoId, ownerId]
    );
    return result.rows.length === 0 ? null : toTodo(result.rows[0]);
  }

  async list(ownerId: number, query: TodoListQuery): Promise<TodoPage> {
    const conditions = ['user_id = $1'];
    const params: unknown[] = [ownerId];
    if (query.status) {
      params.push(query.status);
      conditions.push(`status = $${params.length}`);
    }
    const where = conditions.join(' AND ');

    const countResult = await this.pool.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM todos WHERE ${where}`,
      params
    );

    const pageResult = await this.pool.query<TodoRow>(
      `SELECT ${TODO_COLUMNS} FROM todos
       WHERE ${where}
       ORDER BY id
       OFFSET $${params.length + 1}
       LIMIT $${params.length + 2}`,
      [...params, query.skip, query.limit]
    );

    return {
      todos: pageResult.rows.map(toTodo),
      total: Number(countResult.rows[0].total),
    };
  }

  async update(ownerId: number, todoId: number, patch: TodoPatch): Promise<Todo | null> {
    const { assignments, values } = buildPatchAssignments(patch);
    const result = await this.pool.query<TodoRow>(
      `UPDATE todos SET ${assignments.join(', ')}
       WHERE id = $1 AND user_id = $2
       RETURNING ${TODO_COLUMNS}`,
      [todoId, ownerId, ...values]
    );
    return result.rows.length === 0 ? null : toTodo(result.rows[0]);
  }

  async delete(ownerId: number, todoId: number): Promise<boolean> {
    const result = await this.pool.query(
      'DELETE FROM todos WHERE id = $1 AND user_id = $2',
      [todoId, ownerId]
    );
    return (result.rowCount ?? 0) > 0;
  }
}
