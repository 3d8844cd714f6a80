import {
  DuplicateNicknameError,
  NotRegisteredError,
  ValidationError,
} from "./errors";
import { StepResult, stepHandlerFor } from "./handlers/flows";
import {
  MenuContext,
  MenuResult,
  UNKNOWN_ACTION,
  callbackHandlers,
  commands,
  fallback,
  menuTriggers,
} from "./handlers/menu";
import { EXPENSE_PREFIX } from "./keyboards";
import { LedgerStore } from "./ledger";
import { logger } from "./logger";
import { SessionStore } from "./session";
import {
  ConversationSession,
  InboundEvent,
  KeyboardDescription,
  Reply,
} from "./types";

export interface EngineOptions {
  ledger: LedgerStore;
  sessions: SessionStore;
  timeZone: string;
  topLimit: number;
  now?: () => Date;
}

export const FAILURE_NOTICE = "⚠️ Сталася помилка. Спробуйте пізніше.";

/** "/start", "/start@my_bot", "/start payload" → "start" */
export function parseCommand(text: string): string | undefined {
  const match = /^\/([a-z_]+)(?:@\w+)?(?:\s|$)/i.exec(text.trim());
  return match?.[1].toLowerCase();
}

function splitPayload(payload: string): [prefix: string, value: string] {
  const at = payload.indexOf(":");
  return at === -1 ? [payload, ""] : [payload.slice(0, at), payload.slice(at + 1)];
}

/**
 * Per-user conversation state machine.
 *
 * Events are dispatched in this order: commands (which always reset the
 * session), the active step if a session exists, menu buttons, then a
 * fallback. Inline callbacks are routed by payload prefix. Callers must not
 * feed two events of the same user concurrently.
 */
export class ConversationEngine {
  private readonly ledger: LedgerStore;
  private readonly sessions: SessionStore;
  private readonly timeZone: string;
  private readonly topLimit: number;
  private readonly now: () => Date;

  constructor(options: EngineOptions) {
    this.ledger = options.ledger;
    this.sessions = options.sessions;
    this.timeZone = options.timeZone;
    this.topLimit = options.topLimit;
    this.now = options.now ?? (() => new Date());
  }

  async handle(event: InboundEvent): Promise<Reply[]> {
    try {
      return await this.dispatch(event);
    } catch (err) {
      return await this.recover(event, err);
    }
  }

  private async dispatch(event: InboundEvent): Promise<Reply[]> {
    const ctx = this.menuContext(event);

    if (event.kind === "callback") {
      return await this.onCallback(event, ctx);
    }

    const command = parseCommand(event.payload);
    const commandHandler = command ? commands.get(command) : undefined;
    if (commandHandler) {
      await this.sessions.clear(event.senderId);
      return await this.apply(event, await commandHandler(ctx));
    }

    const session = await this.sessions.get(event.senderId);
    if (session) {
      return await this.step(event, session, event.payload);
    }

    const trigger = menuTriggers.get(event.payload.trim()) ?? fallback;
    return await this.apply(event, await trigger(ctx));
  }

  private async onCallback(event: InboundEvent, ctx: MenuContext): Promise<Reply[]> {
    const [prefix, value] = splitPayload(event.payload);

    if (prefix === EXPENSE_PREFIX) {
      const session = await this.sessions.get(event.senderId);
      if (session?.state.flow === "addExpense" && session.state.step === "category") {
        return await this.step(event, session, value);
      }
      await this.sessions.clear(event.senderId);
      return [this.message(event, "Не знайдено суму. Почніть заново.")];
    }

    const handler = callbackHandlers.get(prefix);
    if (!handler) {
      return [this.message(event, UNKNOWN_ACTION)];
    }
    return await this.apply(event, await handler(ctx, value));
  }

  private async step(
    event: InboundEvent,
    session: ConversationSession,
    text: string,
  ): Promise<Reply[]> {
    const userId = event.senderId;
    const handler = stepHandlerFor(session.state);

    let result: StepResult;
    try {
      result = await handler({
        userId,
        senderName: event.senderName,
        kind: event.kind,
        text,
        data: session.data,
        ledger: this.ledger,
        now: this.now(),
      });
    } catch (err) {
      if (err instanceof ValidationError || err instanceof DuplicateNicknameError) {
        return [this.message(event, err.message)];
      }
      throw err;
    }

    switch (result.outcome) {
      case "retry":
        return [this.message(event, result.text, result.keyboard)];
      case "next":
        await this.sessions.set(userId, { state: result.state, data: result.data });
        return [this.message(event, result.text, result.keyboard)];
      case "abort":
        await this.sessions.clear(userId);
        return [this.message(event, result.text)];
      case "done":
        try {
          await result.commit?.(this.ledger);
        } catch (err) {
          // someone registered the same nickname while this flow was open
          if (err instanceof DuplicateNicknameError) {
            const { nickname: _taken, ...data } = session.data;
            await this.sessions.set(userId, {
              state: { flow: "registration", step: "nickname" },
              data,
            });
            return [this.message(event, err.message)];
          }
          throw err;
        }
        await this.sessions.clear(userId);
        logger.debug("flow completed", { userId, flow: session.state.flow });
        return [this.message(event, result.text, result.keyboard)];
    }
  }

  private async apply(event: InboundEvent, result: MenuResult): Promise<Reply[]> {
    if (result.enter) {
      await this.sessions.set(event.senderId, { state: result.enter, data: {} });
    }
    const replies: Reply[] = [];
    if (result.dismiss) {
      replies.push({ kind: "dismiss", recipientId: event.senderId });
    }
    if (result.prompt) {
      replies.push(this.message(event, result.prompt.text, result.prompt.keyboard));
    }
    return replies;
  }

  private async recover(event: InboundEvent, err: unknown): Promise<Reply[]> {
    if (err instanceof NotRegisteredError || err instanceof ValidationError) {
      return [this.message(event, err.message)];
    }

    logger.error("failed to handle event", {
      userId: event.senderId,
      kind: event.kind,
      err,
    });
    try {
      await this.sessions.clear(event.senderId);
    } catch (clearErr) {
      logger.error("failed to reset session", {
        userId: event.senderId,
        err: clearErr,
      });
    }
    return [this.message(event, FAILURE_NOTICE)];
  }

  private menuContext(event: InboundEvent): MenuContext {
    return {
      userId: event.senderId,
      senderName: event.senderName,
      ledger: this.ledger,
      now: this.now(),
      timeZone: this.timeZone,
      topLimit: this.topLimit,
    };
  }

  private message(
    event: InboundEvent,
    text: string,
    keyboard?: KeyboardDescription,
  ): Reply {
    return keyboard
      ? { kind: "message", recipientId: event.senderId, text, keyboard }
      : { kind: "message", recipientId: event.senderId, text };
  }
}
