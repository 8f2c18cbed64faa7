/**
 * Wharf Kernel — WebAssembly Module Sections
 *
 * Just enough of the binary format to read, strip and append custom
 * sections. Signed modules carry their claims in a custom section named
 * `jwt`, appended after every other section.
 *
 *   module   := magic version section*
 *   section  := id:u8 size:leb128 contents
 *   custom   := name_len:leb128 name contents   (id 0)
 */

import { BuildError } from '../errors/index.js';

const HEADER = Uint8Array.of(0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00);

export const CUSTOM_SECTION_ID = 0;

export interface WasmSection {
  readonly id: number;
  /** Offset of the section's id byte. */
  readonly start: number;
  /** Offset just past the section's contents. */
  readonly end: number;
  readonly contents: Uint8Array;
  /** Custom sections only. */
  readonly name?: string | undefined;
}

export function encodeLeb128(value: number): Uint8Array {
  const out: number[] = [];
  let v = value;
  do {
    let byte = v & 0x7f;
    v = Math.floor(v / 128);
    if (v !== 0) byte |= 0x80;
    out.push(byte);
  } while (v !== 0);
  return Uint8Array.from(out);
}

export function decodeLeb128(bytes: Uint8Array, offset: number): { value: number; next: number } {
  let value = 0;
  let scale = 1;
  let i = offset;
  for (;;) {
    const byte = bytes[i];
    if (byte === undefined || i - offset >= 5) {
      throw new BuildError('InvalidArtifact', `Malformed LEB128 integer at offset ${offset}`);
    }
    value += (byte & 0x7f) * scale;
    scale *= 128;
    i++;
    if ((byte & 0x80) === 0) return { value, next: i };
  }
}

export function isWasmModule(bytes: Uint8Array): boolean {
  return bytes.length >= HEADER.length && HEADER.every((b, i) => bytes[i] === b);
}

/** @throws {BuildError} InvalidArtifact when the bytes are not a well-formed module */
export function readSections(bytes: Uint8Array): WasmSection[] {
  if (!isWasmModule(bytes)) {
    throw new BuildError('InvalidArtifact', 'Not a WebAssembly module (bad magic or version)');
  }
  const decoder = new TextDecoder();
  const sections: WasmSection[] = [];
  let offset = HEADER.length;
  while (offset < bytes.length) {
    const start = offset;
    const id = bytes[offset] ?? 0;
    const size = decodeLeb128(bytes, offset + 1);
    const end = size.next + size.value;
    if (end > bytes.length) {
      throw new BuildError('InvalidArtifact', `Section at offset ${start} runs past the end of the module`);
    }
    const contents = bytes.subarray(size.next, end);
    let name: string | undefined;
    if (id === CUSTOM_SECTION_ID) {
      const nameLength = decodeLeb128(contents, 0);
      name = decoder.decode(contents.subarray(nameLength.next, nameLength.next + nameLength.value));
    }
    sections.push({ id, start, end, contents, name });
    offset = end;
  }
  return sections;
}

/** Payload of the first custom section called `name` (after its name field). */
export function customSection(bytes: Uint8Array, name: string): Uint8Array | undefined {
  for (const section of readSections(bytes)) {
    if (section.id !== CUSTOM_SECTION_ID || section.name !== name) continue;
    const nameLength = decodeLeb128(section.contents, 0);
    return section.contents.subarray(nameLength.next + nameLength.value);
  }
  return undefined;
}

/** The module with every custom section called `name` removed. */
export function withoutCustomSection(bytes: Uint8Array, name: string): Uint8Array {
  const kept: Uint8Array[] = [bytes.subarray(0, HEADER.length)];
  for (const section of readSections(bytes)) {
    if (section.id === CUSTOM_SECTION_ID && section.name === name) continue;
    kept.push(bytes.subarray(section.start, section.end));
  }
  return concat(kept);
}

export function appendCustomSection(bytes: Uint8Array, name: string, payload: Uint8Array): Uint8Array {
  readSections(bytes);
  const nameBytes = new TextEncoder().encode(name);
  const body = concat([encodeLeb128(nameBytes.length), nameBytes, payload]);
  return concat([bytes, Uint8Array.of(CUSTOM_SECTION_ID), encodeLeb128(body.length), body]);
}

function concat(parts: ReadonlyArray<Uint8Array>): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
