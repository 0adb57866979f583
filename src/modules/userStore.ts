import type { Db } from "../db";
import { User, NewUser, UserChanges } from "../interfaces/user";
import { UserRowSchema } from "../schemas/user.schema";

/**
 * Row-level access to the users table. Methods throw on SQLite errors;
 * callers decide how failures are reported.
 */
export class UserStore {
  constructor(private readonly db: Db) {}

  create(input: NewUser): User {
    const result = this.db
      .prepare("INSERT INTO users (username, balance) VALUES (?, ?)")
      .run(input.username, input.balance);

    return {
      id: Number(result.lastInsertRowid),
      username: input.username,
      balance: input.balance,
    };
  }

  findById(id: number): User | null {
    const row = this.db.prepare("SELECT id, username, balance FROM users WHERE id = ?").get(id);
    return row === undefined ? null : UserRowSchema.parse(row);
  }

  list(): User[] {
    const rows = this.db.prepare("SELECT id, username, balance FROM users ORDER BY id").all();
    return UserRowSchema.array().parse(rows);
  }

  /** Apply the allow-listed changes. Returns the updated user, or null when absent. */
  update(id: number, changes: UserChanges): User | null {
    const current = this.findById(id);
    if (!current) return null;

    const next: User = {
      id,
      username: changes.username ?? current.username,
      balance: changes.balance ?? current.balance,
    };

    this.db
      .prepare("UPDATE users SET username = ?, balance = ? WHERE id = ?")
      .run(next.username, next.balance, id);

    return next;
  }

  setBalance(id: number, balance: number): void {
    this.db.prepare("UPDATE users SET balance = ? WHERE id = ?").run(balance, id);
  }

  /** Returns false when no row matched. */
  delete(id: number): boolean {
    const result = this.db.prepare("DELETE FROM users WHERE id = ?").run(id);
    return result.changes > 0;
  }

  /** Run `fn` inside a transaction; any throw rolls the whole transaction back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}
