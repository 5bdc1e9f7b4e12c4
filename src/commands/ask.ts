import { Command } from "commander";
import { requireQuestion, type RagAnswer } from "../services/index.js";
import { formatSourceCitations, groupSourcesByFile } from "../utils/sources.js";
import {
  parsePositiveInt,
  parseScore,
  type CommandContext,
} from "./context.js";

interface AskCommandOptions {
  conversation?: string;
  model?: string;
  topK?: number;
  scoreThreshold?: number;
  instructions?: string;
}

const RULE = "─".repeat(60);

/**
 * Print an answer, its grouped sources and the ids needed to follow up
 */
export function printAnswer(answer: RagAnswer): void {
  console.log(RULE);
  console.log(answer.text || "(no answer text)");
  console.log(RULE);

  const sources = groupSourcesByFile(answer);
  if (sources.length > 0) {
    console.log("\n📚 Sources:");
    console.log(formatSourceCitations(sources));
  }

  console.log(`\n🧾 Response: ${answer.responseId} (${answer.status}, ${answer.model})`);
  if (answer.conversationId) {
    console.log(`💬 Conversation: ${answer.conversationId}`);
  }
}

export function askCommand(ctx: CommandContext): Command {
  return new Command("ask")
    .description(
      "Answer a question from the files of a vector store, within a conversation"
    )
    .argument("<store>", "Vector store id or name")
    .argument("<question>", "The question to answer")
    .option(
      "-c, --conversation <id>",
      "Continue this conversation (a new one is created when omitted)"
    )
    .option("-m, --model <name>", "Model to answer with")
    .option(
      "-k, --top-k <number>",
      "Maximum number of retrieved chunks",
      parsePositiveInt
    )
    .option(
      "--score-threshold <number>",
      "Minimum relevance score for retrieved chunks (0-1)",
      parseScore
    )
    .option("--instructions <text>", "Override the answering instructions")
    .action((store: string, question: string, options: AskCommandOptions) =>
      ctx.run(async ({ stores, conversations, responses }) => {
        requireQuestion(question);
        const storeId = await stores.resolveId(store);
        const conversationId =
          options.conversation ??
          (await conversations.create({ store_id: storeId }));

        ctx.logger.info("Searching the vector store and generating an answer...");
        const answer = await responses.ask(storeId, conversationId, question, {
          model: options.model,
          topK: options.topK,
          scoreThreshold: options.scoreThreshold,
          instructions: options.instructions,
        });

        printAnswer({
          ...answer,
          conversationId: answer.conversationId ?? conversationId,
        });
      })
    );
}
