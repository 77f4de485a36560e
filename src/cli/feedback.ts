import { applyFeedbackBatch } from "../core/feedback.js";
import { SessionTracker } from "../core/session.js";
import { ValidationError } from "../core/errors.js";
import { parseList, runWithContext } from "./util.js";

export interface FeedbackCommandOptions {
  helpful?: string;
  notRelevant?: string;
  incorrect?: string;
  store?: string;
}

/**
 * CLI feedback takes raw record ids. Session refs only exist inside a
 * running MCP server, so an empty tracker reports any L<n> as not found.
 */
export async function feedbackCommand(options: FeedbackCommandOptions): Promise<void> {
  await runWithContext(options.store, async (ctx) => {
    const request = {
      helpful: parseList(options.helpful),
      notRelevant: parseList(options.notRelevant),
      incorrect: parseList(options.incorrect),
    };
    if (request.helpful.length + request.notRelevant.length + request.incorrect.length === 0) {
      throw new ValidationError("feedback", "pass at least one id to --helpful, --not-relevant or --incorrect");
    }

    const result = await applyFeedbackBatch(request, {
      session: new SessionTracker(),
      registry: ctx.registry,
      defaultStore: ctx.storeId,
    });

    for (const u of result.updated) {
      console.log(`${u.id}: ${u.outcome} ${u.previous.toFixed(2)} -> ${u.current.toFixed(2)}`);
    }
    if (result.notFound.length > 0) {
      console.error(`Not found: ${result.notFound.join(", ")}`);
      process.exitCode = 1;
    }
  });
}
