/** Base class for errors whose message can be shown to the user as is. */
export class BotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends BotError {}

export class DuplicateNicknameError extends BotError {
  constructor(readonly nickname: string) {
    super("Цей псевдонім вже зайнятий. Оберіть інший:");
  }
}

export class NotRegisteredError extends BotError {
  constructor(readonly userId: number) {
    super("Ви не зареєстровані. Надішліть /start щоб зареєструватися.");
  }
}

export class StorageError extends BotError {
  constructor(operation: string, cause: unknown) {
    super(`storage operation "${operation}" failed`, { cause });
  }
}

export class StartupConfigError extends BotError {}
