import { Command } from "commander";
import { RemoteAPIError } from "../errors.js";
import { formatStoreDetails, formatStores } from "../utils/format.js";
import type { CommandContext } from "./context.js";

interface ListOptions {
  json?: boolean;
}

export function storeCommand(ctx: CommandContext): Command {
  const store = new Command("store").description("Manage vector stores");

  store
    .command("get-or-create")
    .description("Get the id of a vector store by name, creating it if missing")
    .argument("<name>", "Vector store name")
    .action((name: string) =>
      ctx.run(async ({ stores }) => {
        console.log(await stores.getOrCreate(name));
      })
    );

  store
    .command("list")
    .description("List all vector stores")
    .option("--json", "Print raw JSON instead of a table")
    .action((options: ListOptions) =>
      ctx.run(async ({ stores }) => {
        const all = await stores.list();
        console.log(
          options.json ? JSON.stringify(all, null, 2) : formatStores(all)
        );
      })
    );

  store
    .command("get")
    .description("Show the details of a vector store")
    .argument("<store>", "Vector store id or name")
    .action((idOrName: string) =>
      ctx.run(async ({ stores }) => {
        const storeId = await stores.resolveId(idOrName);
        console.log(formatStoreDetails(await stores.get(storeId)));
      })
    );

  store
    .command("get-id-by-name")
    .description("Print the id of the vector store with this exact name")
    .argument("<name>", "Vector store name")
    .action((name: string) =>
      ctx.run(async ({ stores }) => {
        console.log(await stores.getIdByName(name));
      })
    );

  store
    .command("delete")
    .description("Delete a vector store")
    .argument("<store_id>", "Vector store id")
    .action((storeId: string) =>
      ctx.run(async ({ stores }) => {
        if (!(await stores.delete(storeId))) {
          throw new RemoteAPIError(
            `Deletion of vector store ${storeId} was not confirmed`
          );
        }
        console.log(`🗑️  Deleted vector store ${storeId}`);
      })
    );

  return store;
}
