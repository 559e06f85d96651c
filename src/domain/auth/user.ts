/**
 * Registered account. Owns zero or more todos.
 */
export interface User {
  readonly id: number;
  readonly email: string;
  readonly username: string;
  readonly passwordHash: string;
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewUser {
  email: string;
  username: string;
  passwordHash: string;
}

/**
 * Storage port for users. Implemented by the pg adapter in infra/db and by
 * the in-memory fake used in tests.
 */
export interface UserRepository {
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  /** Throws ConflictError when email or username is already taken. */
  create(user: NewUser): Promise<User>;
  setActive(id: number, isActive: boolean): Promise<User | null>;
  /** Removes the user together with every todo it owns. */
  delete(id: number): Promise<boolean>;
}
