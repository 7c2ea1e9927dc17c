import { bytesToHex, hexToBytes } from "viem";
import { MalformedEncodingError } from "../utils/errors";

const HEX_BODY = /^[0-9a-fA-F]*$/;

/**
 * Encode bytes as lowercase hex text, without a 0x prefix.
 */
export function encodeHex(bytes: Uint8Array): string {
  return bytesToHex(bytes).slice(2);
}

/**
 * Decode hex text produced by {@link encodeHex}.
 *
 * Surrounding whitespace is ignored (files edited by hand often gain a
 * trailing newline); letters may be in either case.
 *
 * @throws MalformedEncodingError on odd length or a non-hex character
 */
export function decodeHex(text: string): Uint8Array {
  const body = text.trim();

  if (body.length % 2 !== 0) {
    throw new MalformedEncodingError(
      `odd number of hex characters (${body.length})`,
      { length: body.length }
    );
  }

  if (!HEX_BODY.test(body)) {
    const offset = body.search(/[^0-9a-fA-F]/);
    throw new MalformedEncodingError(
      `invalid character ${JSON.stringify(body[offset])} at offset ${offset}`,
      { offset }
    );
  }

  return hexToBytes(`0x${body}`);
}
