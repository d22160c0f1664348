import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { StowageClient } from "../src/client.js";
import { readConfig } from "../src/config.js";

async function expectOk(step: string, response: Response): Promise<void> {
  if (!response.ok) {
    throw new Error(`${step} failed (${response.status}): ${await response.text()}`);
  }
}

async function main(): Promise<void> {
  const client = new StowageClient(readConfig());
  const key = `smoke-${uuidv4()}`;
  const renamed = `${key}-renamed`;
  const encoder = new TextEncoder();

  const dataDir = join(process.cwd(), ".stowage-data");
  await mkdir(dataDir, { recursive: true });
  const filePath = join(dataDir, "smoke.txt");
  await writeFile(filePath, `stowage smoke ${new Date().toISOString()}\n`, "utf8");

  await expectOk("put", await client.put(filePath, key));
  await expectOk("append", await client.append(key, [encoder.encode("appended")]));
  const afterAppend = await client.get(key);

  await expectOk("update", await client.update(key, [encoder.encode("one"), encoder.encode("two")]));
  const renameText = await client.updateKey(key, renamed);
  const afterRename = await client.get(renamed);

  await expectOk("delete", await client.delete(renamed));

  console.log(
    JSON.stringify(
      {
        ok: true,
        baseUrl: client.config.baseUrl,
        key,
        renamed,
        blobsAfterAppend: afterAppend.length,
        renameResponse: renameText,
        blobsAfterUpdate: afterRename.map((blob) => new TextDecoder().decode(blob))
      },
      null,
      2
    )
  );
}

await main();
