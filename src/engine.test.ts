import { beforeEach, describe, expect, it } from "vitest";
import { Db, openDatabase } from "./db";
import { ConversationEngine, FAILURE_NOTICE, parseCommand } from "./engine";
import { expenseCategories, mainMenu, MENU } from "./keyboards";
import { SqliteLedger } from "./ledger";
import { SessionStore } from "./session";
import { Reply } from "./types";

const NOT_REGISTERED = "Ви не зареєстровані. Надішліть /start щоб зареєструватися.";

function texts(replies: Reply[]): string[] {
  return replies.map((reply) => (reply.kind === "message" ? reply.text : "<dismiss>"));
}

describe("parseCommand", () => {
  it("extracts the command name", () => {
    expect(parseCommand("/start")).toBe("start");
    expect(parseCommand("/Start@driver_ledger_bot")).toBe("start");
    expect(parseCommand("/cancel now")).toBe("cancel");
  });

  it("ignores ordinary text", () => {
    expect(parseCommand("hello")).toBeUndefined();
    expect(parseCommand("2025-01-01,2025-01-31")).toBeUndefined();
  });
});

describe("ConversationEngine", () => {
  let db: Db;
  let ledger: SqliteLedger;
  let sessions: SessionStore;
  let engine: ConversationEngine;
  let clock: Date;

  const send = (payload: string, senderId = 1) =>
    engine.handle({ senderId, senderName: "Ivan", kind: "message", payload });
  const press = (payload: string, senderId = 1) =>
    engine.handle({ senderId, senderName: "Ivan", kind: "callback", payload });

  async function register(senderId: number, name: string, nickname: string) {
    await send("/start", senderId);
    await send(name, senderId);
    await send(nickname, senderId);
    await send("Toyota Corolla", senderId);
    await send("bc1234ab", senderId);
  }

  beforeEach(() => {
    db = openDatabase(":memory:");
    ledger = new SqliteLedger(db);
    sessions = new SessionStore();
    clock = new Date("2025-01-15T12:00:00Z");
    engine = new ConversationEngine({
      ledger,
      sessions,
      timeZone: "UTC",
      topLimit: 10,
      now: () => clock,
    });
  });

  describe("registration", () => {
    it("walks a new user through every step", async () => {
      expect(texts(await send("/start"))).toEqual([
        "Вітаю! Щоб почати, введіть ваше справжнє ім'я:",
      ]);
      expect(texts(await send("Ivan"))).toEqual([
        "Придумайте унікальний псевдонім (він буде незмінний):",
      ]);
      expect(texts(await send("ivan99"))).toEqual([
        "Вкажіть марку та модель авто (наприклад Renault Logan):",
      ]);
      expect(texts(await send("Toyota Corolla"))).toEqual([
        "Вкажіть номер автомобіля (наприклад BC1234AB):",
      ]);

      const done = await send("bc1234ab");
      expect(done).toEqual([
        { kind: "message", recipientId: 1, text: "✅ Реєстрацію завершено!", keyboard: mainMenu },
      ]);
      expect(await sessions.get(1)).toBeUndefined();
      expect(await ledger.getUser(1)).toMatchObject({
        tgFirstName: "Ivan",
        displayName: "Ivan",
        nickname: "ivan99",
        vehicleModel: "Toyota Corolla",
        vehiclePlate: "BC1234AB",
        registeredAt: clock,
      });
    });

    it("keeps asking for the plate until it matches", async () => {
      await send("/start");
      await send("Ivan");
      await send("ivan99");
      await send("Toyota Corolla");

      expect(texts(await send("BC12AB"))).toEqual([
        "Невірний формат номера. Спробуйте у форматі BC1234AB.",
      ]);
      expect(await sessions.get(1)).toEqual({
        state: { flow: "registration", step: "plate" },
        data: { name: "Ivan", nickname: "ivan99", carModel: "Toyota Corolla" },
      });
      expect(await ledger.userExists(1)).toBe(false);
    });

    it("rejects a nickname taken in any letter case", async () => {
      await register(2, "Petro", "Driver1");

      await send("/start");
      await send("Ivan");
      for (const attempt of ["driver1", "DRIVER1"]) {
        expect(texts(await send(attempt))).toEqual([
          "Цей псевдонім вже зайнятий. Оберіть інший:",
        ]);
      }
      expect(await sessions.get(1)).toEqual({
        state: { flow: "registration", step: "nickname" },
        data: { name: "Ivan" },
      });
    });

    it("sends the user back to the nickname step when it is taken before the plate", async () => {
      await send("/start");
      await send("Ivan");
      await send("Driver1");
      await send("Toyota Corolla");
      await register(2, "Petro", "DRIVER1");

      expect(texts(await send("bc1234ab"))).toEqual([
        "Цей псевдонім вже зайнятий. Оберіть інший:",
      ]);
      expect(await sessions.get(1)).toEqual({
        state: { flow: "registration", step: "nickname" },
        data: { name: "Ivan", carModel: "Toyota Corolla" },
      });
      expect(Object.keys((await sessions.get(1))?.data ?? {})).not.toContain("nickname");
      expect(await ledger.userExists(1)).toBe(false);
    });

    it("rejects an empty name", async () => {
      await send("/start");
      expect(texts(await send("   "))).toEqual([
        "Ім'я не може бути порожнім. Введіть ваше ім'я:",
      ]);
    });

    it("welcomes back a registered user", async () => {
      await register(1, "Ivan", "ivan99");
      expect(await send("/start")).toEqual([
        { kind: "message", recipientId: 1, text: "З поверненням, Ivan!", keyboard: mainMenu },
      ]);
    });

    it("treats date-shaped text as ordinary input of the current step", async () => {
      await send("/start");
      expect(texts(await send("2025-01-01,2025-01-31"))).toEqual([
        "Придумайте унікальний псевдонім (він буде незмінний):",
      ]);
      expect((await sessions.get(1))?.data.name).toBe("2025-01-01,2025-01-31");
    });
  });

  describe("income and expenses", () => {
    beforeEach(async () => {
      await register(1, "Ivan", "ivan99");
    });

    it("records an income with a comma decimal", async () => {
      expect(texts(await send(MENU.addIncome))).toEqual([
        "Введіть суму доходу (наприклад 250.50):",
      ]);
      expect(texts(await send("100,50"))).toEqual(["Додано до доходів: 100.50"]);
      expect(await sessions.get(1)).toBeUndefined();

      const { incomes } = await ledger.entriesInRange(
        1,
        new Date("2025-01-01T00:00:00Z"),
        new Date("2025-02-01T00:00:00Z"),
      );
      expect(incomes).toHaveLength(1);
      expect(incomes[0]).toMatchObject({ amount: 100.5, timestamp: clock });
    });

    it("does not persist or advance on a bad amount", async () => {
      await send(MENU.addIncome);
      expect(texts(await send("abc"))).toEqual(["Некоректна сума. Введіть число > 0."]);
      expect(texts(await send("-3"))).toEqual(["Некоректна сума. Введіть число > 0."]);
      expect(await sessions.get(1)).toEqual({
        state: { flow: "addIncome", step: "amount" },
        data: {},
      });
      expect((await ledger.balanceSince(1, null)).totalIncome).toBe(0);
    });

    it("records an expense after a category is chosen", async () => {
      await send(MENU.addExpense);
      expect(await send("50.00")).toEqual([
        { kind: "message", recipientId: 1, text: "Оберіть тип витрати:", keyboard: expenseCategories },
      ]);
      expect(texts(await press("exp_type:fuel"))).toEqual(["Додано витрату 50.00 (Паливо)"]);

      const { expenses } = await ledger.entriesInRange(
        1,
        new Date("2025-01-01T00:00:00Z"),
        new Date("2025-02-01T00:00:00Z"),
      );
      expect(expenses).toHaveLength(1);
      expect(expenses[0]).toMatchObject({ amount: 50, category: "fuel" });
      expect(await sessions.get(1)).toBeUndefined();
    });

    it("keeps the pending amount on an unknown category", async () => {
      await send(MENU.addExpense);
      await send("50.00");
      expect(texts(await press("exp_type:banana"))).toEqual(["Невідома дія."]);
      expect(await sessions.get(1)).toEqual({
        state: { flow: "addExpense", step: "category" },
        data: { amount: 50 },
      });
      expect((await ledger.balanceSince(1, null)).totalExpense).toBe(0);
    });

    it("asks for a button when text arrives at the category step", async () => {
      await send(MENU.addExpense);
      await send("50.00");
      expect(await send("fuel")).toEqual([
        {
          kind: "message",
          recipientId: 1,
          text: "Оберіть тип витрати кнопками нижче:",
          keyboard: expenseCategories,
        },
      ]);
    });

    it("reports a category press with no pending amount", async () => {
      expect(texts(await press("exp_type:fuel"))).toEqual(["Не знайдено суму. Почніть заново."]);
      expect((await ledger.balanceSince(1, null)).totalExpense).toBe(0);
    });

    it("lets a command abandon a flow", async () => {
      await send(MENU.addIncome);
      expect(texts(await send("/cancel"))).toEqual(["Дію скасовано."]);
      expect(await sessions.get(1)).toBeUndefined();
    });
  });

  describe("unregistered users", () => {
    it("get a notice instead of a flow", async () => {
      for (const trigger of [MENU.addIncome, MENU.addExpense, MENU.stats, MENU.periodReport]) {
        expect(texts(await send(trigger, 5))).toEqual([NOT_REGISTERED]);
      }
      expect(await sessions.get(5)).toBeUndefined();
    });

    it("can still see the leaderboard", async () => {
      expect(texts(await send(MENU.topDrivers, 5))).toEqual([
        "Поки що немає даних для рейтингу.",
      ]);
    });
  });

  describe("reports", () => {
    beforeEach(async () => {
      await register(1, "Ivan", "ivan99");
    });

    it("lists the entries of a period and its net", async () => {
      await ledger.recordIncome(1, 20, new Date("2025-01-31T23:00:00Z"));
      await ledger.recordIncome(1, 100.5, new Date("2025-01-05T10:00:00Z"));
      await ledger.recordIncome(1, 999, new Date("2025-02-01T00:00:00Z"));
      await ledger.recordExpense(1, 50, "fuel", new Date("2025-01-10T08:00:00Z"));

      expect(texts(await send(MENU.periodReport))).toEqual([
        "Введіть період у форматі РРРР-ММ-ДД,РРРР-ММ-ДД (наприклад 2025-01-01,2025-01-31):",
      ]);
      expect(texts(await send("2025-01-01,2025-01-31"))).toEqual([
        [
          "Звіт за період 2025-01-01 — 2025-01-31:",
          "",
          "Доходи:",
          "- 2025-01-05: 100.50",
          "- 2025-01-31: 20.00",
          "",
          "Витрати:",
          "- 2025-01-10: Паливо 50.00",
          "",
          "Сальдо за період: 70.50",
        ].join("\n"),
      ]);
      expect(await sessions.get(1)).toBeUndefined();
    });

    it("asks again on a malformed period", async () => {
      await send(MENU.periodReport);
      expect(texts(await send("last week"))).toEqual([
        "Невірний формат. Надішліть у вигляді: 2025-01-01,2025-01-31",
      ]);
      expect((await sessions.get(1))?.state).toEqual({ flow: "periodReport", step: "range" });
    });

    it("covers entries up to the last representable end date", async () => {
      await ledger.recordIncome(1, 100, new Date("2025-01-05T10:00:00Z"));

      await send(MENU.periodReport);
      const [report] = texts(await send("2025-01-01,9999-12-30"));
      expect(report.split("\n")).toContain("- 2025-01-05: 100.00");
      expect(report.split("\n")).toContain("Сальдо за період: 100.00");
    });

    it("asks again when the end date leaves the supported years", async () => {
      await send(MENU.periodReport);
      expect(texts(await send("2025-01-01,9999-12-31"))).toEqual([
        "Невірний формат дат. Спробуйте ще раз.",
      ]);
      expect((await sessions.get(1))?.state).toEqual({ flow: "periodReport", step: "range" });
    });

    it("does not treat a date pair as a report request while idle", async () => {
      expect(texts(await send("2025-01-01,2025-01-31"))).toEqual([
        "Оберіть дію в меню нижче.",
      ]);
    });

    it("shows rolling balances", async () => {
      await ledger.recordIncome(1, 100, new Date("2025-01-15T08:00:00Z"));
      await ledger.recordIncome(1, 50, new Date("2025-01-10T12:00:00Z"));
      await ledger.recordExpense(1, 30, "repair", new Date("2024-12-25T12:00:00Z"));
      await ledger.recordIncome(1, 10, new Date("2024-11-01T12:00:00Z"));

      expect(texts(await send(MENU.stats))).toEqual([
        [
          "Баланс загальний: 130.00",
          "Сьогодні: +100.00 -0.00 = 100.00",
          "Тиждень: +150.00 -0.00 = 150.00",
          "Місяць: +150.00 -30.00 = 120.00",
          "Звітний період (щотижня): +150.00 -0.00 = 150.00",
        ].join("\n"),
      ]);
    });

    it("ranks drivers by net balance", async () => {
      await register(2, "Petro", "petro");
      await ledger.recordIncome(1, 70.5, new Date("2025-01-05T10:00:00Z"));
      await ledger.recordIncome(2, 200, new Date("2025-01-05T10:00:00Z"));

      expect(texts(await send(MENU.topDrivers))).toEqual([
        "🏆 Топ водіїв:\n1. Petro (petro) — 200.00\n2. Ivan (ivan99) — 70.50",
      ]);
    });
  });

  describe("profile and settings", () => {
    beforeEach(async () => {
      await register(1, "Ivan", "ivan99");
    });

    it("shows the profile card", async () => {
      expect(texts(await send(MENU.myCar))).toEqual([
        "👤 Ivan\n🏷️ ivan99\n🚘 Toyota Corolla (BC1234AB)\n📆 З нами з 2025-01-15 12:00",
      ]);
    });

    it("edits the name without touching the nickname", async () => {
      expect(texts(await press("edit:name"))).toEqual(["Введіть нове ім'я:"]);
      expect(texts(await send("Іван"))).toEqual(["Ім'я оновлено."]);
      expect(await ledger.getUser(1)).toMatchObject({ displayName: "Іван", nickname: "ivan99" });
    });

    it("edits the car in two steps", async () => {
      await press("edit:car");
      expect(texts(await send("Skoda Octavia"))).toEqual([
        "Вкажіть номер автомобіля (наприклад BC1234AB):",
      ]);
      expect(texts(await send("aa 0001 bb"))).toEqual(["Дані авто оновлено."]);
      expect(await ledger.getUser(1)).toMatchObject({
        vehicleModel: "Skoda Octavia",
        vehiclePlate: "AA0001BB",
      });
    });

    it("closes the profile card", async () => {
      expect(await press("edit:close")).toEqual([{ kind: "dismiss", recipientId: 1 }]);
    });

    it("changes the report period", async () => {
      expect(texts(await press("setperiod:monthly"))).toEqual(["Період звітів змінено."]);
      expect((await ledger.getUser(1))?.reportPeriod).toBe("monthly");
      expect(texts(await press("setperiod:daily"))).toEqual(["Невідома дія."]);
      expect(texts(await press("setlang:uk"))).toEqual(["Мову збережено."]);
    });

    it("answers unknown callbacks", async () => {
      expect(texts(await press("something:else"))).toEqual(["Невідома дія."]);
    });
  });

  describe("storage failures", () => {
    it("reply with a notice and reset the flow", async () => {
      await register(1, "Ivan", "ivan99");
      await send(MENU.addIncome);
      db.close();

      expect(texts(await send("10"))).toEqual([FAILURE_NOTICE]);
      expect(await sessions.get(1)).toBeUndefined();
      expect(texts(await send(MENU.stats))).toEqual([FAILURE_NOTICE]);
    });
  });
});
