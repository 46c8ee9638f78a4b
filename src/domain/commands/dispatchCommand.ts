import { ActionRejectedError } from "../errors/ActionRejectedError.js";
import type { Command, CommandContext } from "./Command.js";

export async function dispatchCommand<TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
): Promise<TResult> {
  const started = Date.now();

  try {
    ctx.logger?.debug(`[CMD] ${command.type}`, { command });
    const result = await command.execute(ctx);
    ctx.logger?.info(`[CMD OK] ${command.type}`, {
      ms: Date.now() - started,
    });
    return result;
  } catch (error) {
    if (error instanceof ActionRejectedError) {
      ctx.logger?.warn(`[CMD REJECTED] ${command.type}`, {
        reason: error.reason,
        message: error.message,
      });
    } else {
      ctx.logger?.error(`[CMD ERR] ${command.type}`, { error });
    }
    throw error;
  }
}
