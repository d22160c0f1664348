import { StowageClient, type BlobList } from "@stowage/client";

const client = new StowageClient({
  baseUrl: "http://localhost:9710",
  identity: "example-user",
  timeoutMs: 10_000
});

export async function storeAndFetch(key: string): Promise<BlobList> {
  const encoder = new TextEncoder();
  const stored = await client.putBinary(key, [encoder.encode("first"), encoder.encode("second")]);
  if (!stored.ok) {
    throw new Error(`HTTP ${stored.status}: ${await stored.text()}`);
  }

  await client.append(key, [encoder.encode("third")]);
  const blobs = await client.get(key);

  console.log("Fetched blobs", blobs.length);
  return blobs;
}
