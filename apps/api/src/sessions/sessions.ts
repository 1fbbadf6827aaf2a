import { randomUUID } from "node:crypto";
import { badRequest, notFound } from "@playroom/shared";
import type { DbTransaction } from "@playroom/db";
import {
  nowIso,
  toGameScore,
  toGameSession,
  type GameState,
  type ScoreRow,
  type SessionRow
} from "../records.js";
import { requireChild } from "../profiles/ownership.js";
import { requireRoom } from "../rooms/roomStore.js";

const LIVE_STATES: GameState[] = ["active", "paused"];

const encodeGameData = (value: unknown) => (value === undefined ? null : JSON.stringify(value));

const requireSession = async (trx: DbTransaction, sessionId: string) => {
  const session = await trx<SessionRow>("game_sessions").where({ id: sessionId }).first();
  if (!session) {
    throw notFound("Game session not found");
  }
  return session;
};

export const createSession = async (
  trx: DbTransaction,
  input: { roomId: string; gameData?: unknown }
) => {
  const room = await requireRoom(trx, input.roomId);
  if (room.status === "finished") {
    throw badRequest("invalid_state", "Room has finished");
  }
  const live = await trx<SessionRow>("game_sessions")
    .where({ room_id: room.id })
    .whereIn("game_state", LIVE_STATES)
    .first("id");
  if (live) {
    throw badRequest("invalid_state", "Room already has a live session");
  }
  const now = nowIso();
  const id = randomUUID();
  await trx<SessionRow>("game_sessions").insert({
    id,
    room_id: room.id,
    game_data: encodeGameData(input.gameData),
    current_turn_player_id: null,
    game_state: "active",
    created_at: now,
    updated_at: now
  });
  return toGameSession(await requireSession(trx, id));
};

export const getSession = async (trx: DbTransaction, sessionId: string) =>
  toGameSession(await requireSession(trx, sessionId));

export type SessionPatch = {
  gameData?: unknown;
  currentTurnPlayerId?: string | null;
  gameState?: GameState;
};

export const updateSession = async (
  trx: DbTransaction,
  sessionId: string,
  patch: SessionPatch
) => {
  const session = await requireSession(trx, sessionId);
  if (session.game_state === "finished") {
    throw badRequest("invalid_state", "Session has finished");
  }
  const changes: Partial<SessionRow> = {};
  if (patch.gameData !== undefined) changes.game_data = encodeGameData(patch.gameData);
  if (patch.currentTurnPlayerId !== undefined) {
    changes.current_turn_player_id = patch.currentTurnPlayerId;
  }
  if (patch.gameState !== undefined) changes.game_state = patch.gameState;
  if (Object.keys(changes).length > 0) {
    await trx<SessionRow>("game_sessions")
      .where({ id: session.id })
      .update({ ...changes, updated_at: nowIso() });
  }
  return getSession(trx, session.id);
};

export type ScoreInput = {
  roomId: string;
  sessionId?: string | null;
  childId?: string | null;
  playerName: string;
  playerAvatar?: string | null;
  isAi?: boolean;
  score: number;
  totalQuestions: number;
};

export const recordScore = async (trx: DbTransaction, input: ScoreInput) => {
  const room = await requireRoom(trx, input.roomId);
  if (input.sessionId) {
    const session = await requireSession(trx, input.sessionId);
    if (session.room_id !== room.id) {
      throw badRequest("invalid_request", "Session does not belong to this room");
    }
  }
  if (input.childId) {
    await requireChild(trx, input.childId);
  }
  const row: ScoreRow = {
    id: randomUUID(),
    room_id: room.id,
    session_id: input.sessionId ?? null,
    child_id: input.childId ?? null,
    player_name: input.playerName,
    player_avatar: input.playerAvatar ?? null,
    is_ai: input.isAi ?? false,
    score: input.score,
    total_questions: input.totalQuestions,
    created_at: nowIso()
  };
  await trx<ScoreRow>("game_scores").insert(row);
  return toGameScore(row);
};

export const listRoomScores = async (trx: DbTransaction, roomId: string) => {
  const room = await requireRoom(trx, roomId);
  const rows = await trx<ScoreRow>("game_scores")
    .where({ room_id: room.id })
    .orderBy("score", "desc")
    .orderBy("created_at", "asc");
  return rows.map(toGameScore);
};
