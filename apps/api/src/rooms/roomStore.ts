import { randomUUID } from "node:crypto";
import { badRequest, notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import { nowIso, toGameRoom, type ChildRow, type ParticipantRow, type RoomRow } from "../records.js";
import { normalizeRoomCode } from "./roomCode.js";

export const findRoom = (trx: DbTransaction, roomId: string) =>
  trx<RoomRow>("game_rooms").where({ id: roomId }).first();

export const requireRoom = async (trx: DbTransaction, roomId: string) => {
  const room = await findRoom(trx, roomId);
  if (!room) {
    throw notFound("Room not found");
  }
  return room;
};

export const requireRoomByCode = async (trx: DbTransaction, roomCode: string) => {
  const room = await trx<RoomRow>("game_rooms")
    .where({ room_code: normalizeRoomCode(roomCode) })
    .first();
  if (!room) {
    throw notFound("Room not found");
  }
  return room;
};

export const participantsOf = (trx: DbTransaction, roomId: string) =>
  trx<ParticipantRow>("room_participants")
    .where({ room_id: roomId })
    .orderBy("joined_at", "asc")
    .orderBy("is_ai", "asc");

export const loadRoomView = async (trx: DbTransaction, roomId: string) => {
  const room = await requireRoom(trx, roomId);
  return toGameRoom(room, await participantsOf(trx, room.id));
};

export const clearRoomReference = (trx: DbTransaction, childId: string) =>
  trx<ChildRow>("child_profiles")
    .where({ id: childId })
    .update({ room_id: null, updated_at: nowIso() });

/** Clears `room_id` on every child that points at the room or sits in it. */
export const releaseOccupants = async (trx: DbTransaction, roomId: string) => {
  const seated = await trx<ParticipantRow>("room_participants")
    .where({ room_id: roomId })
    .whereNotNull("child_id")
    .select("child_id");
  const childIds = seated.flatMap((row) => (row.child_id ? [row.child_id] : []));
  await trx<ChildRow>("child_profiles")
    .where({ room_id: roomId })
    .orWhereIn("id", childIds)
    .update({ room_id: null, updated_at: nowIso() });
};

/** Room deletion: participants, requests and sessions go with it through cascades. */
export const teardownRoom = async (trx: DbTransaction, roomId: string) => {
  await releaseOccupants(trx, roomId);
  await trx<RoomRow>("game_rooms").where({ id: roomId }).delete();
};

/**
 * Takes one seat in a waiting room with a single conditional update, so two admissions
 * racing for the last seat cannot both succeed.
 */
const claimSeat = async (trx: DbTransaction, room: RoomRow) => {
  const claimed = await trx<RoomRow>("game_rooms")
    .where({ id: room.id, status: "waiting" })
    .whereRaw("current_players < max_players")
    .update({ current_players: trx.raw("current_players + 1"), updated_at: nowIso() });
  if (claimed > 0) return;
  const current = await findRoom(trx, room.id);
  if (!current) {
    throw notFound("Room not found");
  }
  if (current.status !== "waiting") {
    throw badRequest("room_not_waiting", "Room is no longer accepting players");
  }
  throw badRequest("room_full", "Room is full");
};

/**
 * Seats a child in a room: the room must be waiting, the child roomless, and a seat free.
 * Every join path (by code, approved request, accepted invitation) goes through here.
 */
export const admitChild = async (trx: DbTransaction, room: RoomRow, child: ChildRow) => {
  if (room.status !== "waiting") {
    throw badRequest("room_not_waiting", "Room is no longer accepting players");
  }
  if (child.room_id) {
    throw badRequest("already_in_room", "Child is already in a room");
  }
  await claimSeat(trx, room);
  const now = nowIso();
  await trx<ParticipantRow>("room_participants").insert({
    id: randomUUID(),
    room_id: room.id,
    child_id: child.id,
    player_name: child.name,
    player_avatar: child.avatar,
    is_ai: false,
    joined_at: now
  });
  const seated = await trx<ChildRow>("child_profiles")
    .where({ id: child.id })
    .whereNull("room_id")
    .update({ room_id: room.id, updated_at: now });
  if (seated === 0) {
    throw badRequest("already_in_room", "Child is already in a room");
  }
};
