import { Db } from "./db";
import {
  DuplicateNicknameError,
  NotRegisteredError,
  StorageError,
} from "./errors";
import {
  Balance,
  EXPENSE_CATEGORIES,
  ExpenseCategory,
  ExpenseEntry,
  IncomeEntry,
  Language,
  LeaderboardRow,
  ProfileChanges,
  RangeEntries,
  ReportPeriod,
  User,
  UserProfile,
} from "./types";

export interface LedgerStore {
  userExists(id: number): Promise<boolean>;
  getUser(id: number): Promise<User | undefined>;
  /** Inserts or fully overwrites the user row; settings fall back to defaults. */
  saveUser(id: number, profile: UserProfile, registeredAt: Date): Promise<void>;
  updateProfile(id: number, changes: ProfileChanges): Promise<void>;
  setLanguage(id: number, language: Language): Promise<void>;
  setReportPeriod(id: number, period: ReportPeriod): Promise<void>;
  nicknameTaken(nickname: string): Promise<boolean>;
  recordIncome(
    userId: number,
    amount: number,
    timestamp: Date,
    note?: string,
  ): Promise<IncomeEntry>;
  recordExpense(
    userId: number,
    amount: number,
    category: ExpenseCategory,
    timestamp: Date,
    note?: string,
  ): Promise<ExpenseEntry>;
  balanceSince(userId: number, since: Date | null): Promise<Balance>;
  topByNetBalance(limit: number): Promise<LeaderboardRow[]>;
  entriesInRange(
    userId: number,
    start: Date,
    endExclusive: Date,
  ): Promise<RangeEntries>;
  countUsers(): Promise<number>;
}

/** The part of the ledger dialogue steps may consult before a flow commits. */
export type LedgerReader = Pick<LedgerStore, "nicknameTaken" | "entriesInRange">;

interface UserRow {
  user_id: number;
  tg_first_name: string | null;
  name: string | null;
  nickname: string | null;
  car_model: string | null;
  car_number: string | null;
  lang: string | null;
  report_period: string | null;
  registered_at: string | null;
}

interface IncomeRow {
  id: number;
  user_id: number;
  amount: number;
  ts: string;
  note: string | null;
}

interface ExpenseRow extends IncomeRow {
  type: string | null;
}

interface SumRow {
  total: number;
}

function sqliteCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function toCategory(value: string | null): ExpenseCategory | null {
  return EXPENSE_CATEGORIES.find((category) => category === value) ?? null;
}

function toUser(row: UserRow): User {
  return {
    id: row.user_id,
    tgFirstName: row.tg_first_name,
    displayName: row.name ?? "",
    nickname: row.nickname ?? "",
    vehicleModel: row.car_model ?? "",
    vehiclePlate: row.car_number ?? "",
    language: row.lang ?? "uk",
    reportPeriod: row.report_period === "monthly" ? "monthly" : "weekly",
    registeredAt: new Date(row.registered_at ?? 0),
  };
}

function toIncome(row: IncomeRow): IncomeEntry {
  return {
    id: row.id,
    userId: row.user_id,
    amount: row.amount,
    timestamp: new Date(row.ts),
    note: row.note,
  };
}

function toExpense(row: ExpenseRow): ExpenseEntry {
  return { ...toIncome(row), category: toCategory(row.type) };
}

export class SqliteLedger implements LedgerStore {
  constructor(private readonly db: Db) {}

  // every driver error surfaces as StorageError unless a caller mapped it first
  private run<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return Promise.resolve(fn());
    } catch (err) {
      if (err instanceof DuplicateNicknameError || err instanceof NotRegisteredError) {
        return Promise.reject(err);
      }
      return Promise.reject(new StorageError(operation, err));
    }
  }

  userExists(id: number) {
    return this.run("userExists", () => {
      const row = this.db
        .prepare<[number], { found: number }>(
          "SELECT 1 AS found FROM users WHERE user_id = ?",
        )
        .get(id);
      return row !== undefined;
    });
  }

  getUser(id: number) {
    return this.run("getUser", () => {
      const row = this.db
        .prepare<[number], UserRow>("SELECT * FROM users WHERE user_id = ?")
        .get(id);
      return row ? toUser(row) : undefined;
    });
  }

  saveUser(id: number, profile: UserProfile, registeredAt: Date) {
    return this.run("saveUser", () => {
      try {
        this.db
          .prepare(
            `INSERT INTO users (user_id, tg_first_name, name, nickname, car_model, car_number, lang, report_period, registered_at)
             VALUES (@id, @tgFirstName, @displayName, @nickname, @vehicleModel, @vehiclePlate, 'uk', 'weekly', @registeredAt)
             ON CONFLICT(user_id) DO UPDATE SET
               tg_first_name = excluded.tg_first_name,
               name = excluded.name,
               nickname = excluded.nickname,
               car_model = excluded.car_model,
               car_number = excluded.car_number,
               lang = excluded.lang,
               report_period = excluded.report_period,
               registered_at = excluded.registered_at`,
          )
          .run({
            id,
            ...profile,
            registeredAt: registeredAt.toISOString(),
          });
      } catch (err) {
        if (sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE") {
          throw new DuplicateNicknameError(profile.nickname);
        }
        throw err;
      }
    });
  }

  updateProfile(id: number, changes: ProfileChanges) {
    return this.run("updateProfile", () => {
      this.db
        .prepare(
          `UPDATE users SET
             name = COALESCE(@displayName, name),
             car_model = COALESCE(@vehicleModel, car_model),
             car_number = COALESCE(@vehiclePlate, car_number)
           WHERE user_id = @id`,
        )
        .run({
          id,
          displayName: changes.displayName ?? null,
          vehicleModel: changes.vehicleModel ?? null,
          vehiclePlate: changes.vehiclePlate ?? null,
        });
    });
  }

  setLanguage(id: number, language: Language) {
    return this.run("setLanguage", () => {
      this.db
        .prepare("UPDATE users SET lang = ? WHERE user_id = ?")
        .run(language, id);
    });
  }

  setReportPeriod(id: number, period: ReportPeriod) {
    return this.run("setReportPeriod", () => {
      this.db
        .prepare("UPDATE users SET report_period = ? WHERE user_id = ?")
        .run(period, id);
    });
  }

  nicknameTaken(nickname: string) {
    return this.run("nicknameTaken", () => {
      const row = this.db
        .prepare<[string], { found: number }>(
          "SELECT 1 AS found FROM users WHERE casefold(nickname) = casefold(?)",
        )
        .get(nickname);
      return row !== undefined;
    });
  }

  private insertEntry(userId: number, insert: () => number | bigint): number {
    try {
      return Number(insert());
    } catch (err) {
      if (sqliteCode(err) === "SQLITE_CONSTRAINT_FOREIGNKEY") {
        throw new NotRegisteredError(userId);
      }
      throw err;
    }
  }

  recordIncome(userId: number, amount: number, timestamp: Date, note?: string) {
    return this.run("recordIncome", () => {
      const id = this.insertEntry(userId, () =>
        this.db
          .prepare(
            "INSERT INTO incomes (user_id, amount, ts, note) VALUES (?, ?, ?, ?)",
          )
          .run(userId, amount, timestamp.toISOString(), note ?? null)
          .lastInsertRowid,
      );
      return { id, userId, amount, timestamp, note: note ?? null };
    });
  }

  recordExpense(
    userId: number,
    amount: number,
    category: ExpenseCategory,
    timestamp: Date,
    note?: string,
  ) {
    return this.run("recordExpense", () => {
      const id = this.insertEntry(userId, () =>
        this.db
          .prepare(
            "INSERT INTO expenses (user_id, amount, type, ts, note) VALUES (?, ?, ?, ?, ?)",
          )
          .run(userId, amount, category, timestamp.toISOString(), note ?? null)
          .lastInsertRowid,
      );
      return { id, userId, amount, category, timestamp, note: note ?? null };
    });
  }

  balanceSince(userId: number, since: Date | null) {
    return this.run("balanceSince", () => {
      const sinceTs = since ? since.toISOString() : null;
      const sum = (table: "incomes" | "expenses") =>
        this.db
          .prepare<{ userId: number; since: string | null }, SumRow>(
            `SELECT COALESCE(SUM(amount), 0) AS total FROM ${table}
             WHERE user_id = @userId AND (@since IS NULL OR ts >= @since)`,
          )
          .get({ userId, since: sinceTs })?.total ?? 0;

      return this.db.transaction((): Balance => {
        const totalIncome = sum("incomes");
        const totalExpense = sum("expenses");
        return { totalIncome, totalExpense, net: totalIncome - totalExpense };
      })();
    });
  }

  topByNetBalance(limit: number) {
    return this.run("topByNetBalance", () =>
      this.db
        .prepare<[number], LeaderboardRow>(
          `SELECT
             u.nickname AS nickname,
             u.name AS displayName,
             COALESCE((SELECT SUM(i.amount) FROM incomes i WHERE i.user_id = u.user_id), 0)
               - COALESCE((SELECT SUM(e.amount) FROM expenses e WHERE e.user_id = u.user_id), 0) AS net
           FROM users u
           ORDER BY net DESC, u.registered_at ASC, u.user_id ASC
           LIMIT ?`,
        )
        .all(limit),
    );
  }

  entriesInRange(userId: number, start: Date, endExclusive: Date) {
    return this.run("entriesInRange", () => {
      const params = {
        userId,
        start: start.toISOString(),
        end: endExclusive.toISOString(),
      };
      const where = "WHERE user_id = @userId AND ts >= @start AND ts < @end ORDER BY ts, id";

      return this.db.transaction((): RangeEntries => {
        const incomes = this.db
          .prepare<typeof params, IncomeRow>(
            `SELECT id, user_id, amount, ts, note FROM incomes ${where}`,
          )
          .all(params);
        const expenses = this.db
          .prepare<typeof params, ExpenseRow>(
            `SELECT id, user_id, amount, type, ts, note FROM expenses ${where}`,
          )
          .all(params);
        return {
          incomes: incomes.map(toIncome),
          expenses: expenses.map(toExpense),
        };
      })();
    });
  }

  countUsers() {
    return this.run("countUsers", () => {
      const row = this.db
        .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM users")
        .get();
      return row?.total ?? 0;
    });
  }
}
