export const EXPENSE_CATEGORIES = ["fuel", "wash", "repair", "other"] as const;
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

export const REPORT_PERIODS = ["weekly", "monthly"] as const;
export type ReportPeriod = (typeof REPORT_PERIODS)[number];

export const LANGUAGES = ["uk"] as const;
export type Language = (typeof LANGUAGES)[number];

export interface UserProfile {
  tgFirstName: string | null;
  displayName: string;
  nickname: string;
  vehicleModel: string;
  vehiclePlate: string;
}

export interface User extends UserProfile {
  id: number;
  language: string;
  reportPeriod: ReportPeriod;
  registeredAt: Date;
}

// nickname is immutable once registered
export type ProfileChanges = Partial<
  Pick<UserProfile, "displayName" | "vehicleModel" | "vehiclePlate">
>;

export interface IncomeEntry {
  id: number;
  userId: number;
  amount: number;
  timestamp: Date;
  note: string | null;
}

export interface ExpenseEntry extends IncomeEntry {
  category: ExpenseCategory | null;
}

export interface Balance {
  totalIncome: number;
  totalExpense: number;
  net: number;
}

export interface LeaderboardRow {
  nickname: string;
  displayName: string;
  net: number;
}

export interface RangeEntries {
  incomes: IncomeEntry[];
  expenses: ExpenseEntry[];
}

// --- conversation

export type ConversationState =
  | { flow: "registration"; step: "name" | "nickname" | "carModel" | "plate" }
  | { flow: "addIncome"; step: "amount" }
  | { flow: "addExpense"; step: "amount" | "category" }
  | { flow: "periodReport"; step: "range" }
  | { flow: "editName"; step: "name" }
  | { flow: "editCar"; step: "carModel" | "plate" };

/** Partial input collected while a flow is running. */
export interface Accumulator {
  name?: string;
  nickname?: string;
  carModel?: string;
  carNumber?: string;
  amount?: number;
}

export interface ConversationSession {
  state: ConversationState;
  data: Accumulator;
}

// --- transport boundary

export interface InboundEvent {
  senderId: number;
  senderName?: string;
  kind: "message" | "callback";
  payload: string;
}

export interface InlineButton {
  label: string;
  payload: string;
}

export type KeyboardDescription =
  | { type: "menu"; rows: string[][] }
  | { type: "inline"; rows: InlineButton[][] };

export type Reply =
  | {
      kind: "message";
      recipientId: number;
      text: string;
      keyboard?: KeyboardDescription;
    }
  // removes the message that carried the pressed inline button
  | { kind: "dismiss"; recipientId: number };

/** Text plus optional keyboard, before it is addressed to a recipient. */
export interface Prompt {
  text: string;
  keyboard?: KeyboardDescription;
}
