import { EXPENSE_CATEGORIES, ExpenseCategory, KeyboardDescription } from "./types";

export const MENU = {
  addIncome: "📥 Додати заробіток",
  addExpense: "💸 Додати витрати",
  stats: "📊 Моя статистика",
  periodReport: "📅 Звіт за період",
  topDrivers: "🏆 Топ водіїв",
  myCar: "🚘 Мій автомобіль",
  settings: "⚙️ Налаштування",
} as const;

export const mainMenu: KeyboardDescription = {
  type: "menu",
  rows: [
    [MENU.addIncome, MENU.addExpense],
    [MENU.stats, MENU.periodReport],
    [MENU.topDrivers, MENU.myCar],
    [MENU.settings],
  ],
};

export const CATEGORY_LABELS: Record<ExpenseCategory, string> = {
  fuel: "Паливо",
  wash: "Мийка",
  repair: "Ремонт",
  other: "Інше",
};

export const EXPENSE_PREFIX = "exp_type";

export const expenseCategories: KeyboardDescription = {
  type: "inline",
  rows: [EXPENSE_CATEGORIES.slice(0, 2), EXPENSE_CATEGORIES.slice(2)].map((row) =>
    row.map((category) => ({
      label: CATEGORY_LABELS[category],
      payload: `${EXPENSE_PREFIX}:${category}`,
    })),
  ),
};

export const editProfile: KeyboardDescription = {
  type: "inline",
  rows: [
    [{ label: "Редагувати ім'я", payload: "edit:name" }],
    [{ label: "Редагувати авто", payload: "edit:car" }],
    [{ label: "Закрити", payload: "edit:close" }],
  ],
};

export const settingsMenu: KeyboardDescription = {
  type: "inline",
  rows: [
    [{ label: "Мова: Українська", payload: "setlang:uk" }],
    [
      { label: "Період звітів: Щотижня", payload: "setperiod:weekly" },
      { label: "Період звітів: Щомісяця", payload: "setperiod:monthly" },
    ],
  ],
};
