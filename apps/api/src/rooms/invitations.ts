import { randomUUID } from "node:crypto";
import { badRequest, forbidden, notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import {
  nowIso,
  toJoinRequest,
  type ChildRow,
  type JoinRequest,
  type JoinRequestRow,
  type ParticipantRow,
  type RoomRow
} from "../records.js";
import { loadOwnedChild, requireChild } from "../profiles/ownership.js";
import { admitChild, findRoom, loadRoomView, requireRoom, requireRoomByCode } from "./roomStore.js";

/**
 * Creates one pending invitation per existing target, skipping the inviter and anyone
 * who already holds a pending invitation to this room.
 */
export const issueInvitations = async (
  trx: DbTransaction,
  room: RoomRow,
  inviter: ChildRow,
  friendIds: string[]
): Promise<JoinRequest[]> => {
  const wanted = [...new Set(friendIds)].filter((id) => id !== inviter.id);
  const targets = await trx<ChildRow>("child_profiles").whereIn("id", wanted);
  const alreadyInvited = await trx<JoinRequestRow>("join_requests")
    .where({ room_id: room.id, kind: "invite", status: "pending" })
    .whereIn(
      "child_id",
      targets.map((target) => target.id)
    )
    .select("child_id");
  const skip = new Set(alreadyInvited.map((row) => row.child_id));
  const now = nowIso();
  const rows = targets
    .filter((target) => !skip.has(target.id))
    .map((target): JoinRequestRow => ({
      id: randomUUID(),
      room_id: room.id,
      room_code: room.room_code,
      child_id: target.id,
      invited_by_child_id: inviter.id,
      kind: "invite",
      player_name: target.name,
      player_avatar: target.avatar,
      status: "pending",
      created_at: now,
      updated_at: now
    }));
  if (rows.length > 0) {
    await trx<JoinRequestRow>("join_requests").insert(rows);
  }
  return rows.map(toJoinRequest);
};

const isSeated = async (trx: DbTransaction, roomId: string, childId: string) =>
  Boolean(
    await trx<ParticipantRow>("room_participants")
      .where({ room_id: roomId, child_id: childId })
      .first("id")
  );

export const inviteFriends = async (
  trx: DbTransaction,
  subject: string,
  input: { roomCode: string; childId: string; friendIds: string[] }
) => {
  const inviter = await loadOwnedChild(trx, subject, input.childId);
  const room = await requireRoomByCode(trx, input.roomCode);
  if (!(await isSeated(trx, room.id, inviter.id))) {
    throw forbidden("Only players in the room can invite");
  }
  if (room.status !== "waiting") {
    throw badRequest("room_not_waiting", "Room is no longer accepting players");
  }
  const existing = await trx<ChildRow>("child_profiles")
    .whereIn("id", input.friendIds)
    .whereNot({ id: inviter.id })
    .count({ total: "*" });
  if (Number(existing[0]?.total ?? 0) === 0) {
    throw notFound("No children to invite");
  }
  return issueInvitations(trx, room, inviter, input.friendIds);
};

export const requestToJoin = async (
  trx: DbTransaction,
  subject: string,
  input: { roomCode: string; childId: string }
) => {
  const child = await loadOwnedChild(trx, subject, input.childId);
  const room = await requireRoomByCode(trx, input.roomCode);
  if (child.room_id === room.id) {
    throw badRequest("already_in_room", "Child is already in this room");
  }
  const pending = await trx<JoinRequestRow>("join_requests")
    .where({ room_id: room.id, child_id: child.id, kind: "request", status: "pending" })
    .first();
  if (pending) {
    return toJoinRequest(pending);
  }
  const now = nowIso();
  const row: JoinRequestRow = {
    id: randomUUID(),
    room_id: room.id,
    room_code: room.room_code,
    child_id: child.id,
    invited_by_child_id: null,
    kind: "request",
    player_name: child.name,
    player_avatar: child.avatar,
    status: "pending",
    created_at: now,
    updated_at: now
  };
  await trx<JoinRequestRow>("join_requests").insert(row);
  return toJoinRequest(row);
};

export const listPendingInvitations = async (
  trx: DbTransaction,
  subject: string,
  childId: string
) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const rows = await trx<JoinRequestRow>("join_requests")
    .where({ child_id: child.id, kind: "invite", status: "pending" })
    .orderBy("created_at", "desc")
    .orderBy("id", "desc");
  return rows.map(toJoinRequest);
};

export const listJoinRequests = async (
  trx: DbTransaction,
  subject: string,
  roomId: string,
  hostChildId: string
) => {
  const room = await requireRoom(trx, roomId);
  const host = await loadOwnedChild(trx, subject, hostChildId);
  if (room.host_child_id !== host.id) {
    throw forbidden("Only the host can review join requests");
  }
  const rows = await trx<JoinRequestRow>("join_requests")
    .where({ room_id: room.id, kind: "request", status: "pending" })
    .orderBy("created_at", "asc");
  return rows.map(toJoinRequest);
};

const requireRequest = async (trx: DbTransaction, requestId: string) => {
  const request = await trx<JoinRequestRow>("join_requests").where({ id: requestId }).first();
  if (!request) {
    throw notFound("Join request not found");
  }
  return request;
};

const roomOfRequest = async (trx: DbTransaction, request: JoinRequestRow) => {
  const room = request.room_id
    ? await findRoom(trx, request.room_id)
    : await trx<RoomRow>("game_rooms").where({ room_code: request.room_code }).first();
  if (!room) {
    throw notFound("Room not found");
  }
  return room;
};

const ensurePending = (request: JoinRequestRow) => {
  if (request.status !== "pending") {
    throw badRequest("invalid_state", `Join request is already ${request.status}`);
  }
};

const settle = async (trx: DbTransaction, request: JoinRequestRow, approve: boolean) => {
  const status = approve ? "approved" : "denied";
  const now = nowIso();
  const settled = await trx<JoinRequestRow>("join_requests")
    .where({ id: request.id, status: "pending" })
    .update({ status, updated_at: now });
  if (settled === 0) {
    throw badRequest("invalid_state", "Join request was already handled");
  }
  return toJoinRequest({ ...request, status, updated_at: now });
};

/**
 * Host-side answer to a request to join. Approval seats the child through the same
 * admission path as a join by code; when the room is full the call fails and the
 * request stays pending.
 */
export const handleJoinRequest = async (
  trx: DbTransaction,
  subject: string,
  input: { requestId: string; hostChildId: string; approve: boolean }
) => {
  const request = await requireRequest(trx, input.requestId);
  const host = await loadOwnedChild(trx, subject, input.hostChildId);
  const room = await roomOfRequest(trx, request);
  if (room.host_child_id !== host.id) {
    throw forbidden("Only the host can handle join requests");
  }
  ensurePending(request);
  if (request.kind !== "request") {
    throw badRequest("invalid_state", "Invitations are answered by the invited child");
  }
  if (input.approve) {
    await admitChild(trx, room, await requireChild(trx, request.child_id));
  }
  const settled = await settle(trx, request, input.approve);
  return { request: settled, room: await loadRoomView(trx, room.id) };
};

const loadOwnInvitation = async (
  trx: DbTransaction,
  subject: string,
  invitationId: string,
  childId: string
) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const invitation = await requireRequest(trx, invitationId);
  if (invitation.child_id !== child.id || invitation.kind !== "invite") {
    throw notFound("Invitation not found");
  }
  ensurePending(invitation);
  return { child, invitation };
};

export const acceptInvitation = async (
  trx: DbTransaction,
  subject: string,
  input: { invitationId: string; childId: string }
) => {
  const { child, invitation } = await loadOwnInvitation(
    trx,
    subject,
    input.invitationId,
    input.childId
  );
  const room = await roomOfRequest(trx, invitation);
  await admitChild(trx, room, child);
  const settled = await settle(trx, invitation, true);
  return { invitation: settled, room: await loadRoomView(trx, room.id) };
};

export const declineInvitation = async (
  trx: DbTransaction,
  subject: string,
  input: { invitationId: string; childId: string }
) => {
  const { invitation } = await loadOwnInvitation(trx, subject, input.invitationId, input.childId);
  return settle(trx, invitation, false);
};
