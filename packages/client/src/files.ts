import { readFile } from "node:fs/promises";
import { FileReadError, InputError } from "@stowage/shared";

export async function readUploadFile(filePath: string): Promise<Uint8Array> {
  if (filePath === "") {
    throw new InputError("file path must not be empty");
  }

  try {
    return await readFile(filePath);
  } catch (error) {
    throw new FileReadError(filePath, error);
  }
}
