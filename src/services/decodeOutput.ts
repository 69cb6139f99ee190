import { TextDecoder } from "node:util";

// Windows PowerShell on a Japanese locale writes in the OEM code page (cp932).
const FALLBACK_ENCODINGS = ["shift_jis"];

const utf8 = new TextDecoder("utf-8", { fatal: true });
const lossyUtf8 = new TextDecoder("utf-8");
const fallbacks = FALLBACK_ENCODINGS.map(createDecoder).filter(
  (decoder): decoder is TextDecoder => decoder !== undefined
);

export function decodeOutput(bytes: Uint8Array): string {
  for (const decoder of [utf8, ...fallbacks]) {
    const text = tryDecode(decoder, bytes);
    if (text !== undefined) {
      return text;
    }
  }
  return lossyUtf8.decode(bytes);
}

function tryDecode(decoder: TextDecoder, bytes: Uint8Array): string | undefined {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    // Fatal decoders throw a TypeError on malformed input.
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

function createDecoder(label: string): TextDecoder | undefined {
  try {
    return new TextDecoder(label, { fatal: true });
  } catch (error) {
    // Node built without full ICU only knows the Unicode encodings.
    if (error instanceof RangeError) {
      return undefined;
    }
    throw error;
  }
}
