import "dotenv/config";
import { withStore } from "../server/db";
import { errorMessage } from "../server/_core/errors";
import { getWarehouseSummary } from "../server/warehouse/queries";

async function countTables() {
  const dataDir = process.argv[2];

  await withStore({ dataDir }, async (store) => {
    console.log(`Table Row Counts (${store.location}):`);
    for (const { table, rows } of await getWarehouseSummary(store.db)) {
      console.log(`${table}: ${rows}`);
    }
  });
}

countTables().catch((error: unknown) => {
  console.error(`ERROR (${errorMessage(error)})`);
  process.exitCode = 1;
});
