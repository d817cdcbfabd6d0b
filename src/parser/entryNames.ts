/**
 * Entry classification and display names for raw 32-byte directory records
 */

import { EntryClass } from '../types/entries';

export const ATTR_VOLUME_ID = 0x08;
export const ATTR_DIRECTORY = 0x10;
export const ATTR_LONG_NAME = 0x0f;

const ATTR_LONG_NAME_MASK = 0x3f;

export const DELETED_MARKER = 0xe5;

// 0x05 in the first name byte stands for a literal 0xE5 character
const KANJI_LEAD_ESCAPE = 0x05;

// UTF-16LE character slots of a long file name fragment
const LFN_CHAR_OFFSETS = [1, 3, 5, 7, 9, 14, 16, 18, 20, 22, 24, 28, 30];

/**
 * Classify a type-tag (attribute) byte. A zero tag ends the directory.
 */
export function classifyEntryType(typeTag: number): EntryClass {
  if (typeTag === 0x00) {
    return 'empty';
  }
  if ((typeTag & ATTR_LONG_NAME_MASK) === ATTR_LONG_NAME) {
    return 'lfn';
  }
  if (typeTag & ATTR_VOLUME_ID) {
    return 'vol';
  }
  if (typeTag & ATTR_DIRECTORY) {
    return 'dir';
  }
  return 'other';
}

/**
 * Human-readable name of a record: the UTF-16 fragment for long-name parts,
 * the padded label for volume entries, and NAME.EXT for everything else.
 * Deleted short names show `_` in place of the overwritten first byte.
 */
export function decodeDisplayName(raw: Uint8Array): string {
  const kind = classifyEntryType(raw[11]);

  if (kind === 'lfn') {
    return decodeLongNameFragment(raw);
  }

  if (kind === 'vol') {
    return decodeShortName(raw.subarray(0, 11));
  }

  const base = decodeShortName(raw.subarray(0, 8));
  const extension = decodeShortName(raw.subarray(8, 11));
  return extension.length > 0 ? `${base}.${extension}` : base;
}

function decodeShortName(bytes: Uint8Array): string {
  const chars = Array.from(bytes, (byte, index) => {
    if (index === 0 && byte === DELETED_MARKER) {
      return '_';
    }
    if (index === 0 && byte === KANJI_LEAD_ESCAPE) {
      return String.fromCharCode(DELETED_MARKER);
    }
    return String.fromCharCode(byte);
  });
  return chars.join('').replace(/[ \u0000]+$/, '');
}

function decodeLongNameFragment(raw: Uint8Array): string {
  const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength);
  const units: number[] = [];
  for (const offset of LFN_CHAR_OFFSETS) {
    const unit = view.getUint16(offset, true);
    if (unit === 0x0000 || unit === 0xffff) {
      break;
    }
    units.push(unit);
  }
  return String.fromCharCode(...units);
}
