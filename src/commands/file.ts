import { Command } from "commander";
import { RemoteAPIError } from "../errors.js";
import {
  DEFAULT_CHUNKING,
  DEFAULT_TOP_K,
  FILE_NAME_ATTRIBUTE,
} from "../services/index.js";
import { readSource } from "../services/uploads.js";
import type { Attributes } from "../utils/attributes.js";
import {
  formatAttributes,
  formatFiles,
  formatHit,
  formatUpload,
} from "../utils/format.js";
import {
  parseAttributeOption,
  parseNonNegativeInt,
  parsePositiveInt,
  parseScore,
  type CommandContext,
} from "./context.js";

interface ListOptions {
  json?: boolean;
}

interface UploadOptions {
  attr: Attributes;
  maxChunkSize: number;
  chunkOverlap: number;
}

interface UpdateOptions {
  attr: Attributes;
}

interface RetrieveOptions {
  topK: number;
  rewriteQuery?: boolean;
  scoreThreshold?: number;
  json?: boolean;
}

export function fileCommand(ctx: CommandContext): Command {
  const file = new Command("file").description(
    "Manage files within a vector store"
  );

  file
    .command("list")
    .description("List the files attached to a vector store")
    .argument("<store>", "Vector store id or name")
    .option("--json", "Print raw JSON instead of a table")
    .action((store: string, options: ListOptions) =>
      ctx.run(async ({ stores, files }) => {
        const storeId = await stores.resolveId(store);
        const attached = await files.list(storeId);
        console.log(
          options.json
            ? JSON.stringify(attached, null, 2)
            : formatFiles(attached, FILE_NAME_ATTRIBUTE)
        );
      })
    );

  file
    .command("upload-and-add")
    .alias("upload")
    .description("Upload a local file or URL and attach it to a vector store")
    .argument("<store>", "Vector store id or name")
    .argument("<path_or_url>", "Local file path or http(s) URL")
    .option(
      "--attr <key=value>",
      "Attribute to attach (repeatable)",
      parseAttributeOption,
      {}
    )
    .option(
      "--max-chunk-size <tokens>",
      "Maximum tokens per chunk",
      parsePositiveInt,
      DEFAULT_CHUNKING.maxChunkSize
    )
    .option(
      "--chunk-overlap <tokens>",
      "Tokens shared by consecutive chunks",
      parseNonNegativeInt,
      DEFAULT_CHUNKING.chunkOverlap
    )
    .action((store: string, source: string, options: UploadOptions) =>
      ctx.run(async ({ stores, files }) => {
        const upload = await files.readSource(source);
        const storeId = await stores.resolveId(store);
        const attached = await files.uploadAndAdd(storeId, upload, options.attr, {
          maxChunkSize: options.maxChunkSize,
          chunkOverlap: options.chunkOverlap,
        });
        console.log(attached.id);
      })
    );

  file
    .command("get-detail")
    .alias("get_detail")
    .description(
      "Show the name, type and size a path or URL would be uploaded with"
    )
    .argument("<path_or_url>", "Local file path or http(s) URL")
    .action((source: string) =>
      ctx.runLocal(async () => {
        const upload = await readSource(source);
        console.log(formatUpload(upload));
      })
    );

  file
    .command("find-id-by-name")
    .description("Print the id of the attached file with this name")
    .argument("<store>", "Vector store id or name")
    .argument("<filename>", "Original file name (case-insensitive)")
    .action((store: string, fileName: string) =>
      ctx.run(async ({ stores, files }) => {
        const storeId = await stores.resolveId(store);
        console.log(await files.findIdByName(storeId, fileName));
      })
    );

  file
    .command("update-attrs")
    .description("Replace the attributes of an attached file")
    .argument("<store>", "Vector store id or name")
    .argument("<file_id>", "Vector store file id")
    .option(
      "--attr <key=value>",
      "Attribute to set (repeatable)",
      parseAttributeOption,
      {}
    )
    .action((store: string, fileId: string, options: UpdateOptions) =>
      ctx.run(async ({ stores, files }) => {
        const storeId = await stores.resolveId(store);
        const updated = await files.updateAttrs(storeId, fileId, options.attr);
        console.log(
          `✅ ${updated.id}: ${formatAttributes(updated.attributes) || "(no attributes)"}`
        );
      })
    );

  file
    .command("delete")
    .description("Detach a file from a vector store")
    .argument("<store>", "Vector store id or name")
    .argument("<file_id>", "Vector store file id")
    .action((store: string, fileId: string) =>
      ctx.run(async ({ stores, files }) => {
        const storeId = await stores.resolveId(store);
        if (!(await files.delete(storeId, fileId))) {
          throw new RemoteAPIError(`Deletion of file ${fileId} was not confirmed`);
        }
        console.log(`🗑️  Deleted file ${fileId}`);
      })
    );

  file
    .command("semantic-retrieve")
    .description("Run a similarity search against a vector store")
    .argument("<store>", "Vector store id or name")
    .argument("<query>", "Search text")
    .option(
      "-k, --top-k <number>",
      "Maximum number of results",
      parsePositiveInt,
      DEFAULT_TOP_K
    )
    .option("--rewrite-query", "Let the service rewrite the query first")
    .option(
      "--score-threshold <number>",
      "Minimum relevance score (0-1)",
      parseScore
    )
    .option("--json", "Print raw JSON")
    .action((store: string, query: string, options: RetrieveOptions) =>
      ctx.run(async ({ stores, files }) => {
        const storeId = await stores.resolveId(store);
        const hits = await files.semanticRetrieve(storeId, query, {
          topK: options.topK,
          rewriteQuery: options.rewriteQuery,
          scoreThreshold: options.scoreThreshold,
        });

        if (options.json) {
          console.log(JSON.stringify(hits, null, 2));
          return;
        }

        if (hits.length === 0) {
          console.log("📭 No results found.");
          return;
        }

        console.log(`📋 Found ${hits.length} result(s):\n`);
        console.log(
          hits.map((hit, i) => formatHit(hit, i, FILE_NAME_ATTRIBUTE)).join("\n\n")
        );
      })
    );

  return file;
}
