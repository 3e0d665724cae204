import { pino, type BaseLogger } from "pino";
import type { EventSink } from "./event-sink.js";
import type { Result } from "./result.js";
import type { KeyValueBackend } from "./storage/backend.js";
import type { AccountId, CommandResult, LedgerErrorCode, LedgerEvent } from "./types.js";

export type LedgerLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function silentLogger(): LedgerLogger {
  return pino({ name: "ledger-core", level: "silent" });
}

class CommandRejection extends Error {
  constructor(readonly code: LedgerErrorCode) {
    super(code);
    this.name = "CommandRejection";
  }
}

export interface CommandScope<E extends LedgerErrorCode> {
  emit(event: LedgerEvent): void;
  reject(code: E): never;
  /** Returns the success value or rejects the command with the error. */
  unwrap<T>(result: Result<T, E>): T;
}

/**
 * Runs one command inside a storage transaction. Events are buffered while the
 * handler runs and handed to the sink before the transaction commits, so a
 * sink that writes through the same backend commits or rolls back with the
 * command. A rejected command, or a sink that throws, leaves no writes behind.
 */
export class CommandExecutor {
  constructor(
    private readonly backend: KeyValueBackend,
    private readonly sink: EventSink,
    private readonly logger: LedgerLogger,
  ) {}

  execute<T, E extends LedgerErrorCode>(
    command: string,
    caller: AccountId,
    handler: (scope: CommandScope<E>) => T,
  ): CommandResult<T, E> {
    const events: LedgerEvent[] = [];
    const outcome: { rejection?: E } = {};
    const reject = (code: E): never => {
      outcome.rejection = code;
      throw new CommandRejection(code);
    };
    const scope: CommandScope<E> = {
      emit: (event) => {
        events.push(event);
      },
      reject,
      unwrap: (result) => (result.ok ? result.value : reject(result.error)),
    };

    let value: T;
    try {
      value = this.backend.transaction(() => {
        const result = handler(scope);
        for (const event of events) {
          this.sink.deposit(event);
        }
        return result;
      });
    } catch (error) {
      if (error instanceof CommandRejection && outcome.rejection !== undefined) {
        const code = outcome.rejection;
        this.logger.info({ command, caller, code }, "command rejected");
        return { ok: false, error: code };
      }
      this.logger.error({ command, caller, err: error }, "command failed");
      throw error;
    }

    this.logger.debug(
      { command, caller, events: events.map((event) => event.type) },
      "command committed",
    );
    return { ok: true, value, events };
  }
}
