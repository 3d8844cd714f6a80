import { subDays } from "date-fns";
import { NotRegisteredError } from "../errors";
import {
  MENU,
  editProfile,
  mainMenu,
  settingsMenu,
} from "../keyboards";
import { LedgerStore } from "../ledger";
import {
  ConversationState,
  LANGUAGES,
  Prompt,
  REPORT_PERIODS,
  ReportPeriod,
  User,
} from "../types";
import { fmtAmount, fmtDate, fmtSigned, getRange } from "../utils";
import { PROMPTS } from "./flows";

export interface MenuContext {
  userId: number;
  senderName?: string;
  ledger: LedgerStore;
  now: Date;
  timeZone: string;
  topLimit: number;
}

/** What a command, menu button or settings callback asks the engine to do. */
export interface MenuResult {
  prompt?: Prompt;
  enter?: ConversationState;
  dismiss?: boolean;
}

export type MenuHandler = (ctx: MenuContext) => Promise<MenuResult>;
export type CallbackHandler = (
  ctx: MenuContext,
  value: string,
) => Promise<MenuResult>;

export const UNKNOWN_ACTION = "Невідома дія.";

const PERIOD_LABELS: Record<ReportPeriod, string> = {
  weekly: "щотижня",
  monthly: "щомісяця",
};

async function requireUser({ ledger, userId }: MenuContext): Promise<User> {
  const user = await ledger.getUser(userId);
  if (!user) throw new NotRegisteredError(userId);
  return user;
}

// --- commands

const start: MenuHandler = async (ctx) => {
  const user = await ctx.ledger.getUser(ctx.userId);
  if (user) {
    return {
      prompt: {
        text: `З поверненням, ${ctx.senderName ?? user.displayName}!`,
        keyboard: mainMenu,
      },
    };
  }
  return {
    prompt: { text: PROMPTS.name },
    enter: { flow: "registration", step: "name" },
  };
};

const help: MenuHandler = async () => ({
  prompt: {
    text: [
      "📚 Допомога",
      "",
      "Бот допомагає водіям вести облік заробітку та витрат.",
      "",
      "/start — реєстрація або головне меню",
      "/cancel — скасувати поточну дію",
      "/help — це повідомлення",
      "",
      `${MENU.addIncome} — записати дохід`,
      `${MENU.addExpense} — записати витрату`,
      `${MENU.stats} — баланс за день, тиждень, місяць`,
      `${MENU.periodReport} — записи за довільний період`,
      `${MENU.topDrivers} — рейтинг за балансом`,
      `${MENU.myCar} — профіль та авто`,
    ].join("\n"),
  },
});

const cancel: MenuHandler = async (ctx) => {
  const registered = await ctx.ledger.userExists(ctx.userId);
  return {
    prompt: {
      text: "Дію скасовано.",
      keyboard: registered ? mainMenu : undefined,
    },
  };
};

export const commands = new Map<string, MenuHandler>([
  ["start", start],
  ["help", help],
  ["cancel", cancel],
]);

// --- menu buttons

const addIncome: MenuHandler = async (ctx) => {
  await requireUser(ctx);
  return {
    prompt: { text: PROMPTS.incomeAmount },
    enter: { flow: "addIncome", step: "amount" },
  };
};

const addExpense: MenuHandler = async (ctx) => {
  await requireUser(ctx);
  return {
    prompt: { text: PROMPTS.expenseAmount },
    enter: { flow: "addExpense", step: "amount" },
  };
};

const stats: MenuHandler = async (ctx) => {
  const user = await requireUser(ctx);
  const { ledger, userId, now } = ctx;
  const { start: periodStart } = getRange(user.reportPeriod, ctx.timeZone, now);

  const [total, day, week, month, period] = await Promise.all([
    ledger.balanceSince(userId, null),
    ledger.balanceSince(userId, subDays(now, 1)),
    ledger.balanceSince(userId, subDays(now, 7)),
    ledger.balanceSince(userId, subDays(now, 30)),
    ledger.balanceSince(userId, periodStart),
  ]);

  const line = (label: string, b: typeof total) =>
    `${label}: ${fmtSigned(b.totalIncome, b.totalExpense, b.net)}`;

  return {
    prompt: {
      text: [
        `Баланс загальний: ${fmtAmount(total.net)}`,
        line("Сьогодні", day),
        line("Тиждень", week),
        line("Місяць", month),
        line(`Звітний період (${PERIOD_LABELS[user.reportPeriod]})`, period),
      ].join("\n"),
      keyboard: mainMenu,
    },
  };
};

const periodReport: MenuHandler = async (ctx) => {
  await requireUser(ctx);
  return {
    prompt: { text: PROMPTS.reportRange },
    enter: { flow: "periodReport", step: "range" },
  };
};

const topDrivers: MenuHandler = async ({ ledger, topLimit }) => {
  const rows = await ledger.topByNetBalance(topLimit);
  if (!rows.length) {
    return { prompt: { text: "Поки що немає даних для рейтингу." } };
  }
  const lines = rows.map(
    (row, i) => `${i + 1}. ${row.displayName} (${row.nickname}) — ${fmtAmount(row.net)}`,
  );
  return {
    prompt: { text: ["🏆 Топ водіїв:", ...lines].join("\n"), keyboard: mainMenu },
  };
};

const myCar: MenuHandler = async (ctx) => {
  const user = await requireUser(ctx);
  return {
    prompt: {
      text: [
        `👤 ${user.displayName}`,
        `🏷️ ${user.nickname}`,
        `🚘 ${user.vehicleModel} (${user.vehiclePlate})`,
        `📆 З нами з ${fmtDate(user.registeredAt, ctx.timeZone)}`,
      ].join("\n"),
      keyboard: editProfile,
    },
  };
};

const settings: MenuHandler = async () => ({
  prompt: { text: "Налаштування:", keyboard: settingsMenu },
});

export const menuTriggers = new Map<string, MenuHandler>([
  [MENU.addIncome, addIncome],
  [MENU.addExpense, addExpense],
  [MENU.stats, stats],
  [MENU.periodReport, periodReport],
  [MENU.topDrivers, topDrivers],
  [MENU.myCar, myCar],
  [MENU.settings, settings],
]);

/** Idle text that matches nothing. */
export const fallback: MenuHandler = async (ctx) => {
  await requireUser(ctx);
  return { prompt: { text: "Оберіть дію в меню нижче.", keyboard: mainMenu } };
};

// --- inline callbacks (expense categories are a conversation step, not here)

const edit: CallbackHandler = async (ctx, value) => {
  if (value === "close") return { dismiss: true };
  if (value !== "name" && value !== "car") {
    return { prompt: { text: UNKNOWN_ACTION } };
  }
  await requireUser(ctx);
  return value === "name"
    ? {
        prompt: { text: PROMPTS.newName },
        enter: { flow: "editName", step: "name" },
      }
    : {
        prompt: { text: PROMPTS.newCarModel },
        enter: { flow: "editCar", step: "carModel" },
      };
};

const setLanguage: CallbackHandler = async (ctx, value) => {
  const language = LANGUAGES.find((lang) => lang === value);
  if (!language) return { prompt: { text: UNKNOWN_ACTION } };
  await requireUser(ctx);
  await ctx.ledger.setLanguage(ctx.userId, language);
  return { prompt: { text: "Мову збережено." } };
};

const setPeriod: CallbackHandler = async (ctx, value) => {
  const period = REPORT_PERIODS.find((p) => p === value);
  if (!period) return { prompt: { text: UNKNOWN_ACTION } };
  await requireUser(ctx);
  await ctx.ledger.setReportPeriod(ctx.userId, period);
  return { prompt: { text: "Період звітів змінено." } };
};

export const callbackHandlers = new Map<string, CallbackHandler>([
  ["edit", edit],
  ["setlang", setLanguage],
  ["setperiod", setPeriod],
]);
