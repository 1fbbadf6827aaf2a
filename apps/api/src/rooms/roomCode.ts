import { randomInt } from "node:crypto";
import { isUniqueViolation, type DbTransaction } from "@playroom/db";
import type { RoomRow } from "../records.js";

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export const ROOM_CODE_LENGTH = 6;
export const ROOM_CODE_ATTEMPTS = 5;

export const ROOM_CODE_PATTERN = /^[A-Z0-9]{6}$/;

export type RandomIndex = (max: number) => number;

export const generateRoomCode = (random: RandomIndex = randomInt) => {
  let code = "";
  for (let index = 0; index < ROOM_CODE_LENGTH; index += 1) {
    code += ALPHABET.charAt(random(ALPHABET.length));
  }
  return code;
};

export const normalizeRoomCode = (value: string) => value.trim().toUpperCase();

/**
 * Picks a code no live room uses and hands it to `insert`. The existence check and the
 * insert share the caller's transaction; the insert runs in a savepoint so a unique
 * conflict from a concurrent creator costs one attempt instead of the transaction.
 */
export const insertWithRoomCode = async (
  trx: DbTransaction,
  insert: (scope: DbTransaction, code: string) => Promise<void>,
  generate: () => string = () => generateRoomCode()
) => {
  for (let attempt = 1; attempt <= ROOM_CODE_ATTEMPTS; attempt += 1) {
    const code = generate();
    const taken = await trx<RoomRow>("game_rooms").where({ room_code: code }).first("id");
    if (taken) continue;
    try {
      await trx.transaction((savepoint) => insert(savepoint, code));
      return code;
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
    }
  }
  throw new Error("room_code_exhausted");
};
