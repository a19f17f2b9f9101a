import { customAlphabet, random } from "nanoid";

// Use URL-safe characters, exclude similar looking ones
const alphabet = "23456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnpqrstuvwxyz";
const nanoid = customAlphabet(alphabet, 10);

export function generateImageId(): string {
  return nanoid();
}

export const UNIQUE_TAIL_BYTES = 16;

/** Random bytes appended to uploads so the host never de-duplicates a re-upload. */
export function randomTail(size = UNIQUE_TAIL_BYTES): Buffer {
  return Buffer.from(random(size));
}
