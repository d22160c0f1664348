import { Builder, ByteBuffer } from "flatbuffers";
import { EncodeError, ParseError } from "./errors.js";
import type { BlobList, DecodeOptions } from "./types.js";

// Layout of packages/shared/schema/file_data.fbs:
//   table FileData { data:[ubyte]; }        slot 0
//   table FileDataList { files:[FileData]; } slot 0
const FILES_SLOT = 0;
const DATA_SLOT = 0;

const SIZE_UOFFSET = 4;
const SIZE_SOFFSET = 4;
const SIZE_VOFFSET = 2;
const VTABLE_HEADER_SIZE = 2 * SIZE_VOFFSET;
const BUFFER_ALIGNMENT = 4;

// Per blob: length prefix, up to 3 bytes of padding, the FileData table, its vtable and
// the reference in the files vector.
const PER_BLOB_OVERHEAD = 24;
const ROOT_OVERHEAD = 32;

export function encodeBlobList(blobs: readonly Uint8Array[]): Uint8Array {
  try {
    const builder = new Builder(estimateEncodedSize(blobs));

    const files: number[] = [];
    for (const blob of blobs) {
      const data = createDataVector(builder, blob);
      builder.startObject(1);
      builder.addFieldOffset(DATA_SLOT, data, 0);
      files.push(builder.endObject());
    }

    builder.startVector(SIZE_UOFFSET, files.length, SIZE_UOFFSET);
    for (let index = files.length - 1; index >= 0; index -= 1) {
      builder.addOffset(files[index]);
    }
    const filesVector = builder.endVector();

    builder.startObject(1);
    builder.addFieldOffset(FILES_SLOT, filesVector, 0);
    builder.finish(builder.endObject());

    return builder.asUint8Array();
  } catch (error) {
    throw new EncodeError("failed to encode blob list", {
      details: { blobs: blobs.length },
      cause: error
    });
  }
}

function createDataVector(builder: Builder, blob: Uint8Array): number {
  builder.startVector(1, blob.length, 1);
  for (let index = blob.length - 1; index >= 0; index -= 1) {
    builder.addInt8(blob[index]);
  }
  return builder.endVector();
}

function estimateEncodedSize(blobs: readonly Uint8Array[]): number {
  let total = ROOT_OVERHEAD;
  for (const blob of blobs) {
    total += blob.length + PER_BLOB_OVERHEAD;
  }
  return total;
}

/**
 * Parses a buffer written by {@link encodeBlobList}, or by any FlatBuffers builder using the
 * same schema, back into its blobs in their original order.
 *
 * The whole structure is bounds-checked before anything is copied out, so a truncated or
 * malformed buffer fails with a {@link ParseError} rather than yielding a partial list.
 * Elements with an empty or absent payload are dropped unless `emptyBlobs` is `"keep"`.
 */
export function decodeBlobList(buffer: Uint8Array, options: DecodeOptions = {}): BlobList {
  const keepEmpty = options.emptyBlobs === "keep";

  if (buffer.byteLength < SIZE_UOFFSET) {
    throw new ParseError("truncated", `buffer of ${buffer.byteLength} bytes has no root offset`, {
      size: buffer.byteLength
    });
  }
  if (buffer.byteLength % BUFFER_ALIGNMENT !== 0) {
    throw new ParseError(
      "truncated",
      `buffer size ${buffer.byteLength} is not a multiple of ${BUFFER_ALIGNMENT}`,
      { size: buffer.byteLength }
    );
  }

  const bb = new ByteBuffer(buffer);
  const root = readTable(bb, bb.readUint32(0), "file list");
  const files = readVector(bb, root, FILES_SLOT, SIZE_UOFFSET, "files");
  if (files === null) {
    return [];
  }

  // Verify every element before copying any of them.
  const payloads: Array<VectorRef | null> = [];
  for (let index = 0; index < files.length; index += 1) {
    const reference = files.start + index * SIZE_UOFFSET;
    const element = readTable(bb, reference + bb.readUint32(reference), `file ${index}`);
    payloads.push(readVector(bb, element, DATA_SLOT, 1, `file ${index} data`));
  }

  const blobs: BlobList = [];
  for (const payload of payloads) {
    if (payload === null || payload.length === 0) {
      if (keepEmpty) {
        blobs.push(new Uint8Array(0));
      }
      continue;
    }
    blobs.push(new Uint8Array(buffer.subarray(payload.start, payload.start + payload.length)));
  }
  return blobs;
}

interface TableRef {
  position: number;
  vtable: number;
  vtableSize: number;
  tableSize: number;
}

interface VectorRef {
  start: number;
  length: number;
}

function readTable(bb: ByteBuffer, position: number, what: string): TableRef {
  requireAligned(position, SIZE_SOFFSET, `${what} table`);
  requireRange(bb, position, SIZE_SOFFSET, `${what} table`);

  const vtable = position - bb.readInt32(position);
  requireAligned(vtable, SIZE_VOFFSET, `${what} vtable`);
  requireRange(bb, vtable, VTABLE_HEADER_SIZE, `${what} vtable`);

  const vtableSize = bb.readUint16(vtable);
  const tableSize = bb.readUint16(vtable + SIZE_VOFFSET);
  if (vtableSize < VTABLE_HEADER_SIZE || vtableSize % SIZE_VOFFSET !== 0) {
    throw new ParseError("layout", `${what} vtable declares an invalid size ${vtableSize}`, {
      offset: vtable
    });
  }
  if (tableSize < SIZE_SOFFSET) {
    throw new ParseError("layout", `${what} table declares an invalid size ${tableSize}`, {
      offset: position
    });
  }
  requireRange(bb, vtable, vtableSize, `${what} vtable`);
  requireRange(bb, position, tableSize, `${what} table`);

  return { position, vtable, vtableSize, tableSize };
}

function readVector(
  bb: ByteBuffer,
  table: TableRef,
  slot: number,
  elementSize: number,
  what: string
): VectorRef | null {
  const entry = VTABLE_HEADER_SIZE + slot * SIZE_VOFFSET;
  // Tables written by an older schema may not have the slot at all.
  if (entry + SIZE_VOFFSET > table.vtableSize) {
    return null;
  }
  const fieldOffset = bb.readUint16(table.vtable + entry);
  if (fieldOffset === 0) {
    return null;
  }
  if (fieldOffset < SIZE_SOFFSET || fieldOffset + SIZE_UOFFSET > table.tableSize) {
    throw new ParseError("layout", `${what} field lies outside its table`, {
      offset: table.position,
      fieldOffset
    });
  }

  const field = table.position + fieldOffset;
  requireAligned(field, SIZE_UOFFSET, `${what} reference`);
  const vector = field + bb.readUint32(field);
  requireAligned(vector, SIZE_UOFFSET, `${what} vector`);
  requireRange(bb, vector, SIZE_UOFFSET, `${what} length`);

  const length = bb.readUint32(vector);
  const start = vector + SIZE_UOFFSET;
  requireRange(bb, start, length * elementSize, `${what} contents`);
  return { start, length };
}

function requireRange(bb: ByteBuffer, offset: number, size: number, what: string): void {
  if (offset < 0 || offset + size > bb.capacity()) {
    throw new ParseError(
      "truncated",
      `${what} at offset ${offset} needs ${size} bytes but the buffer holds ${bb.capacity()}`,
      { offset, size, capacity: bb.capacity() }
    );
  }
}

function requireAligned(offset: number, alignment: number, what: string): void {
  if (offset % alignment !== 0) {
    throw new ParseError("misaligned", `${what} at offset ${offset} is not ${alignment}-byte aligned`, {
      offset
    });
  }
}
