import { randomUUID } from "node:crypto";
import { badRequest, forbidden, notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import {
  nowIso,
  toGameRoom,
  type ChildRow,
  type ParticipantRow,
  type RoomRow,
  type RoomStatus
} from "../records.js";
import { loadOwnedChild } from "../profiles/ownership.js";
import { pickAiPlayer } from "./aiRoster.js";
import { insertWithRoomCode } from "./roomCode.js";
import { issueInvitations } from "./invitations.js";
import {
  admitChild,
  clearRoomReference,
  findRoom,
  loadRoomView,
  participantsOf,
  releaseOccupants,
  requireRoom,
  requireRoomByCode,
  teardownRoom
} from "./roomStore.js";

export type CreateRoomInput = {
  hostChildId: string;
  gameId: string;
  difficulty: string;
  maxPlayers: number;
  selectedCategory?: string | null;
  friendIds?: string[];
};

export type LifecycleOptions = {
  random?: () => number;
  generateCode?: () => string;
};

export const createRoom = async (
  trx: DbTransaction,
  subject: string,
  input: CreateRoomInput,
  options: LifecycleOptions = {}
) => {
  const host = await loadOwnedChild(trx, subject, input.hostChildId);
  if (host.room_id) {
    throw badRequest("already_in_room", "Child is already in a room");
  }
  const friendIds = [...new Set(input.friendIds ?? [])].filter((id) => id !== host.id);
  const ai = friendIds.length === 0 ? pickAiPlayer(options.random) : null;
  const now = nowIso();
  const roomId = randomUUID();

  await insertWithRoomCode(
    trx,
    async (scope, code) => {
      await scope<RoomRow>("game_rooms").insert({
        id: roomId,
        room_code: code,
        host_child_id: host.id,
        game_id: input.gameId,
        difficulty: input.difficulty,
        max_players: input.maxPlayers,
        current_players: ai ? 2 : 1,
        status: "waiting",
        has_ai_player: Boolean(ai),
        ai_player_name: ai?.name ?? null,
        ai_player_avatar: ai?.avatar ?? null,
        selected_category: input.selectedCategory ?? null,
        created_at: now,
        updated_at: now
      });
    },
    options.generateCode
  );

  await trx<ParticipantRow>("room_participants").insert({
    id: randomUUID(),
    room_id: roomId,
    child_id: host.id,
    player_name: host.name,
    player_avatar: host.avatar,
    is_ai: false,
    joined_at: now
  });
  if (ai) {
    await trx<ParticipantRow>("room_participants").insert({
      id: randomUUID(),
      room_id: roomId,
      child_id: null,
      player_name: ai.name,
      player_avatar: ai.avatar,
      is_ai: true,
      joined_at: now
    });
  }
  await trx<ChildRow>("child_profiles")
    .where({ id: host.id })
    .update({ room_id: roomId, updated_at: now });

  const room = await requireRoom(trx, roomId);
  const invitations =
    friendIds.length > 0 ? await issueInvitations(trx, room, host, friendIds) : [];
  return { room: await loadRoomView(trx, roomId), invitations };
};

export const joinRoom = async (
  trx: DbTransaction,
  subject: string,
  input: { roomCode: string; childId: string }
) => {
  const child = await loadOwnedChild(trx, subject, input.childId);
  const room = await requireRoomByCode(trx, input.roomCode);
  await admitChild(trx, room, child);
  return loadRoomView(trx, room.id);
};

export type LeaveOutcome = {
  roomId: string;
  roomDeleted: boolean;
};

/**
 * A host leaving tears the room down for everyone; anyone else gives up their seat.
 * A reference to a room that no longer exists is cleared.
 */
export const leaveRoom = async (
  trx: DbTransaction,
  subject: string,
  input: { childId: string }
): Promise<LeaveOutcome> => {
  const child = await loadOwnedChild(trx, subject, input.childId);
  if (!child.room_id) {
    throw notFound("Child is not in a room", "not_in_room");
  }
  const roomId = child.room_id;
  const room = await findRoom(trx, roomId);
  if (!room) {
    await clearRoomReference(trx, child.id);
    return { roomId, roomDeleted: false };
  }
  if (room.host_child_id === child.id) {
    await teardownRoom(trx, room.id);
    return { roomId, roomDeleted: true };
  }
  const removed = await trx<ParticipantRow>("room_participants")
    .where({ room_id: room.id, child_id: child.id })
    .delete();
  if (removed > 0) {
    await trx<RoomRow>("game_rooms")
      .where({ id: room.id })
      .where("current_players", ">", 0)
      .update({ current_players: trx.raw("current_players - 1"), updated_at: nowIso() });
  }
  await clearRoomReference(trx, child.id);
  return { roomId, roomDeleted: false };
};

const requireHost = async (trx: DbTransaction, subject: string, room: RoomRow, childId: string) => {
  const child = await loadOwnedChild(trx, subject, childId);
  if (room.host_child_id !== child.id) {
    throw forbidden("Only the host can do this");
  }
  return child;
};

export const closeRoom = async (
  trx: DbTransaction,
  subject: string,
  input: { roomId: string; childId: string }
) => {
  const room = await requireRoom(trx, input.roomId);
  await requireHost(trx, subject, room, input.childId);
  await teardownRoom(trx, room.id);
};

const NEXT_STATUS: Record<RoomStatus, RoomStatus | null> = {
  waiting: "playing",
  playing: "finished",
  finished: null
};

export const updateRoomStatus = async (
  trx: DbTransaction,
  subject: string,
  roomId: string,
  input: { childId: string; status: RoomStatus }
) => {
  const room = await requireRoom(trx, roomId);
  await requireHost(trx, subject, room, input.childId);
  if (NEXT_STATUS[room.status] !== input.status) {
    throw badRequest("invalid_state", `Room cannot move from ${room.status} to ${input.status}`);
  }
  const moved = await trx<RoomRow>("game_rooms")
    .where({ id: room.id, status: room.status })
    .update({ status: input.status, updated_at: nowIso() });
  if (moved === 0) {
    throw badRequest("invalid_state", "Room status changed concurrently");
  }
  // A finished room holds nobody.
  if (input.status === "finished") {
    await releaseOccupants(trx, room.id);
  }
  return loadRoomView(trx, room.id);
};

export const getCurrentRoom = async (trx: DbTransaction, subject: string, childId: string) => {
  const child = await loadOwnedChild(trx, subject, childId);
  if (!child.room_id) return null;
  const room = await findRoom(trx, child.room_id);
  if (!room) {
    await clearRoomReference(trx, child.id);
    return null;
  }
  return toGameRoom(room, await participantsOf(trx, room.id));
};

export const listParticipants = async (trx: DbTransaction, roomId: string) => {
  const view = await loadRoomView(trx, roomId);
  return view.participants ?? [];
};
