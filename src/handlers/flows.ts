import { DuplicateNicknameError } from "../errors";
import {
  CATEGORY_LABELS,
  expenseCategories,
  mainMenu,
} from "../keyboards";
import { LedgerReader, LedgerStore } from "../ledger";
import {
  Accumulator,
  ConversationState,
  EXPENSE_CATEGORIES,
  KeyboardDescription,
  RangeEntries,
} from "../types";
import { fmtAmount, fmtDay } from "../utils";
import {
  ReportRange,
  cleanText,
  parseAmount,
  parsePlate,
  parseReportRange,
} from "../validation";

export interface StepInput {
  userId: number;
  senderName?: string;
  kind: "message" | "callback";
  /** Message text, or the value part of a callback payload. */
  text: string;
  data: Accumulator;
  ledger: LedgerReader;
  now: Date;
}

/** The single write a flow performs once its last step accepts input. */
export type Commit = (ledger: LedgerStore) => Promise<unknown>;

export type StepResult =
  | { outcome: "retry"; text: string; keyboard?: KeyboardDescription }
  | {
      outcome: "next";
      state: ConversationState;
      data: Accumulator;
      text: string;
      keyboard?: KeyboardDescription;
    }
  | {
      outcome: "done";
      text: string;
      keyboard?: KeyboardDescription;
      commit?: Commit;
    }
  | { outcome: "abort"; text: string };

/**
 * A step validates one input. Bad input is signalled by throwing
 * ValidationError (or DuplicateNicknameError); the engine keeps the state.
 */
export type StepHandler = (input: StepInput) => Promise<StepResult>;

export const PROMPTS = {
  name: "Вітаю! Щоб почати, введіть ваше справжнє ім'я:",
  nickname: "Придумайте унікальний псевдонім (він буде незмінний):",
  carModel: "Вкажіть марку та модель авто (наприклад Renault Logan):",
  plate: "Вкажіть номер автомобіля (наприклад BC1234AB):",
  incomeAmount: "Введіть суму доходу (наприклад 250.50):",
  expenseAmount: "Введіть суму витрати (наприклад 50.00):",
  expenseCategory: "Оберіть тип витрати:",
  reportRange:
    "Введіть період у форматі РРРР-ММ-ДД,РРРР-ММ-ДД (наприклад 2025-01-01,2025-01-31):",
  newName: "Введіть нове ім'я:",
  newCarModel: "Введіть нову марку та модель авто:",
} as const;

function requireText(
  data: Accumulator,
  key: "name" | "nickname" | "carModel",
): string {
  const value = data[key];
  if (value === undefined) {
    throw new Error(`accumulator has no "${key}"`);
  }
  return value;
}

// --- registration

const askNickname: StepHandler = async ({ text, data }) => {
  const name = cleanText(text, "Ім'я не може бути порожнім. Введіть ваше ім'я:");
  return {
    outcome: "next",
    state: { flow: "registration", step: "nickname" },
    data: { ...data, name },
    text: PROMPTS.nickname,
  };
};

const askCarModel: StepHandler = async ({ text, data, ledger }) => {
  const nickname = cleanText(
    text,
    "Псевдонім не може бути порожнім. Придумайте псевдонім:",
  );
  if (await ledger.nicknameTaken(nickname)) {
    throw new DuplicateNicknameError(nickname);
  }
  return {
    outcome: "next",
    state: { flow: "registration", step: "carModel" },
    data: { ...data, nickname },
    text: PROMPTS.carModel,
  };
};

const askPlate: StepHandler = async ({ text, data }) => {
  const carModel = cleanText(text, "Вкажіть марку та модель авто:");
  return {
    outcome: "next",
    state: { flow: "registration", step: "plate" },
    data: { ...data, carModel },
    text: PROMPTS.plate,
  };
};

const completeRegistration: StepHandler = async ({
  userId,
  senderName,
  text,
  data,
  now,
}) => {
  const plate = parsePlate(text);
  const profile = {
    tgFirstName: senderName ?? null,
    displayName: requireText(data, "name"),
    nickname: requireText(data, "nickname"),
    vehicleModel: requireText(data, "carModel"),
    vehiclePlate: plate,
  };
  return {
    outcome: "done",
    text: "✅ Реєстрацію завершено!",
    keyboard: mainMenu,
    commit: (ledger) => ledger.saveUser(userId, profile, now),
  };
};

// --- income / expense

const saveIncome: StepHandler = async ({ userId, text, now }) => {
  const amount = parseAmount(text);
  return {
    outcome: "done",
    text: `Додано до доходів: ${fmtAmount(amount)}`,
    keyboard: mainMenu,
    commit: (ledger) => ledger.recordIncome(userId, amount, now),
  };
};

const askCategory: StepHandler = async ({ text, data }) => {
  const amount = parseAmount(text);
  return {
    outcome: "next",
    state: { flow: "addExpense", step: "category" },
    data: { ...data, amount },
    text: PROMPTS.expenseCategory,
    keyboard: expenseCategories,
  };
};

const saveExpense: StepHandler = async ({ userId, kind, text, data, now }) => {
  if (kind === "message") {
    return {
      outcome: "retry",
      text: "Оберіть тип витрати кнопками нижче:",
      keyboard: expenseCategories,
    };
  }

  const category = EXPENSE_CATEGORIES.find((c) => c === text);
  if (!category) {
    return { outcome: "retry", text: "Невідома дія." };
  }

  const amount = data.amount;
  if (amount === undefined) {
    return { outcome: "abort", text: "Не знайдено суму. Почніть заново." };
  }

  return {
    outcome: "done",
    text: `Додано витрату ${fmtAmount(amount)} (${CATEGORY_LABELS[category]})`,
    keyboard: mainMenu,
    commit: (ledger) => ledger.recordExpense(userId, amount, category, now),
  };
};

// --- period report

export function formatReport(range: ReportRange, entries: RangeEntries): string {
  const incomeLines = entries.incomes.map(
    (entry) => `- ${fmtDay(entry.timestamp)}: ${fmtAmount(entry.amount)}`,
  );
  const expenseLines = entries.expenses.map((entry) => {
    const label = entry.category ? CATEGORY_LABELS[entry.category] : "Без категорії";
    return `- ${fmtDay(entry.timestamp)}: ${label} ${fmtAmount(entry.amount)}`;
  });

  const sum = (values: { amount: number }[]) =>
    values.reduce((total, entry) => total + entry.amount, 0);
  const net = sum(entries.incomes) - sum(entries.expenses);

  return [
    `Звіт за період ${range.from} — ${range.to}:`,
    "",
    "Доходи:",
    ...(incomeLines.length ? incomeLines : ["- немає"]),
    "",
    "Витрати:",
    ...(expenseLines.length ? expenseLines : ["- немає"]),
    "",
    `Сальдо за період: ${fmtAmount(net)}`,
  ].join("\n");
}

const sendReport: StepHandler = async ({ userId, text, ledger }) => {
  const range = parseReportRange(text);
  const entries = await ledger.entriesInRange(
    userId,
    range.start,
    range.endExclusive,
  );
  return {
    outcome: "done",
    text: formatReport(range, entries),
    keyboard: mainMenu,
  };
};

// --- profile edits

const saveName: StepHandler = async ({ userId, text }) => {
  const displayName = cleanText(text, "Ім'я не може бути порожнім. Введіть нове ім'я:");
  return {
    outcome: "done",
    text: "Ім'я оновлено.",
    keyboard: mainMenu,
    commit: (ledger) => ledger.updateProfile(userId, { displayName }),
  };
};

const askNewPlate: StepHandler = async ({ text, data }) => {
  const carModel = cleanText(text, "Вкажіть марку та модель авто:");
  return {
    outcome: "next",
    state: { flow: "editCar", step: "plate" },
    data: { ...data, carModel },
    text: PROMPTS.plate,
  };
};

const saveCar: StepHandler = async ({ userId, text, data }) => {
  const vehiclePlate = parsePlate(text);
  const vehicleModel = requireText(data, "carModel");
  return {
    outcome: "done",
    text: "Дані авто оновлено.",
    keyboard: mainMenu,
    commit: (ledger) =>
      ledger.updateProfile(userId, { vehicleModel, vehiclePlate }),
  };
};

type RegistrationStep = Extract<ConversationState, { flow: "registration" }>["step"];

const registrationSteps: Record<RegistrationStep, StepHandler> = {
  name: askNickname,
  nickname: askCarModel,
  carModel: askPlate,
  plate: completeRegistration,
};

export function stepHandlerFor(state: ConversationState): StepHandler {
  switch (state.flow) {
    case "registration":
      return registrationSteps[state.step];
    case "addIncome":
      return saveIncome;
    case "addExpense":
      return state.step === "amount" ? askCategory : saveExpense;
    case "periodReport":
      return sendReport;
    case "editName":
      return saveName;
    case "editCar":
      return state.step === "carModel" ? askNewPlate : saveCar;
  }
}
