import { randomUUID } from "node:crypto";
import { badRequest, notFound } from "@playroom/shared";
import { isUniqueViolation, type DbTransaction } from "@playroom/db";
import { nowIso, toFriendEdge, type ChildRow, type FriendRow } from "../records.js";
import { findParent, loadOwnedChild, requireChild } from "../profiles/ownership.js";

export type Presence = "offline" | "online" | "in-game";

export type FriendSummary = {
  childId: string;
  name: string;
  avatar: string | null;
  ageGroup: string;
  presence: Presence;
};

export const SEARCH_LIMIT = 20;

export const derivePresence = (child: Pick<ChildRow, "is_online" | "room_id">): Presence => {
  if (!(child.is_online === true || child.is_online === 1)) return "offline";
  return child.room_id ? "in-game" : "online";
};

const toSummary = (child: ChildRow): FriendSummary => ({
  childId: child.id,
  name: child.name,
  avatar: child.avatar,
  ageGroup: child.age_group,
  presence: derivePresence(child)
});

const edgeBetween = (trx: DbTransaction, a: string, b: string) =>
  trx<FriendRow>("friends")
    .where((builder) => builder.where({ requester_id: a, addressee_id: b }))
    .orWhere((builder) => builder.where({ requester_id: b, addressee_id: a }))
    .first();

const edgesOf = (trx: DbTransaction, childId: string) =>
  trx<FriendRow>("friends").where({ requester_id: childId }).orWhere({ addressee_id: childId });

const partnerOf = (edge: FriendRow, childId: string) =>
  edge.requester_id === childId ? edge.addressee_id : edge.requester_id;

const edgeExists = () => badRequest("friend_edge_exists", "A friendship or request already exists");

export const sendFriendRequest = async (
  trx: DbTransaction,
  subject: string,
  input: { requesterId: string; addresseeId: string }
) => {
  if (input.requesterId === input.addresseeId) {
    throw badRequest("invalid_request", "A child cannot befriend themselves");
  }
  const requester = await loadOwnedChild(trx, subject, input.requesterId);
  const addressee = await requireChild(trx, input.addresseeId);
  if (await edgeBetween(trx, requester.id, addressee.id)) {
    throw edgeExists();
  }
  const now = nowIso();
  const row: FriendRow = {
    id: randomUUID(),
    requester_id: requester.id,
    addressee_id: addressee.id,
    status: "pending",
    created_at: now,
    updated_at: now
  };
  try {
    await trx<FriendRow>("friends").insert(row);
  } catch (error) {
    if (isUniqueViolation(error)) throw edgeExists();
    throw error;
  }
  return toFriendEdge(row);
};

export const listIncomingRequests = async (
  trx: DbTransaction,
  subject: string,
  childId: string
) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const edges = await trx<FriendRow>("friends")
    .where({ addressee_id: child.id, status: "pending" })
    .orderBy("created_at", "desc");
  const requesters = await trx<ChildRow>("child_profiles").whereIn(
    "id",
    edges.map((edge) => edge.requester_id)
  );
  const byId = new Map(requesters.map((row) => [row.id, row]));
  return edges.map((edge) => {
    const requester = byId.get(edge.requester_id);
    return {
      ...toFriendEdge(edge),
      requester: requester
        ? { childId: requester.id, name: requester.name, avatar: requester.avatar }
        : null
    };
  });
};

const requireEdge = async (trx: DbTransaction, requestId: string) => {
  const edge = await trx<FriendRow>("friends").where({ id: requestId }).first();
  if (!edge) {
    throw notFound("Friend request not found");
  }
  return edge;
};

const ensurePending = (edge: FriendRow) => {
  if (edge.status !== "pending") {
    throw badRequest("invalid_state", `Friend request is ${edge.status}`);
  }
};

export const acceptFriendRequest = async (
  trx: DbTransaction,
  subject: string,
  requestId: string
) => {
  const edge = await requireEdge(trx, requestId);
  await loadOwnedChild(trx, subject, edge.addressee_id);
  ensurePending(edge);
  const now = nowIso();
  await trx<FriendRow>("friends")
    .where({ id: edge.id, status: "pending" })
    .update({ status: "accepted", updated_at: now });
  return toFriendEdge({ ...edge, status: "accepted", updated_at: now });
};

/** Either side may decline; a declined request leaves no edge behind. */
export const declineFriendRequest = async (
  trx: DbTransaction,
  subject: string,
  requestId: string
) => {
  const edge = await requireEdge(trx, requestId);
  const parent = await findParent(trx, subject);
  const sides = parent
    ? await trx<ChildRow>("child_profiles")
        .whereIn("id", [edge.requester_id, edge.addressee_id])
        .andWhere({ parent_id: parent.id })
    : [];
  if (sides.length === 0) {
    throw notFound("Friend request not found");
  }
  ensurePending(edge);
  await trx<FriendRow>("friends").where({ id: edge.id }).delete();
};

export const listFriends = async (trx: DbTransaction, subject: string, childId: string) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const edges = await edgesOf(trx, child.id);
  const accepted = edges.filter((edge) => edge.status === "accepted");
  const partners = await trx<ChildRow>("child_profiles").whereIn(
    "id",
    accepted.map((edge) => partnerOf(edge, child.id))
  );
  const byId = new Map(partners.map((row) => [row.id, row]));
  return accepted.flatMap((edge) => {
    const partner = byId.get(partnerOf(edge, child.id));
    if (!partner) return [];
    return [{ friendshipId: edge.id, since: toFriendEdge(edge).updatedAt, ...toSummary(partner) }];
  });
};

export const removeFriend = async (
  trx: DbTransaction,
  subject: string,
  childId: string,
  friendChildId: string
) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const edge = await edgeBetween(trx, child.id, friendChildId);
  if (!edge) {
    throw notFound("Friendship not found");
  }
  await trx<FriendRow>("friends").where({ id: edge.id }).delete();
};

const escapeLike = (value: string) => value.replace(/[\\%_]/g, (match) => `\\${match}`);

/**
 * Case-insensitive name search that leaves out the searching child and everyone
 * already connected to it by an edge of any status, in either direction.
 */
export const searchChildren = async (
  trx: DbTransaction,
  subject: string,
  childId: string,
  query: string
) => {
  const child = await loadOwnedChild(trx, subject, childId);
  const term = query.trim().toLowerCase();
  if (!term) {
    throw badRequest("invalid_request", "Search query is empty");
  }
  const edges = await edgesOf(trx, child.id);
  const excluded = [child.id, ...edges.map((edge) => partnerOf(edge, child.id))];
  const rows = await trx<ChildRow>("child_profiles")
    .whereRaw("lower(name) like ? escape '\\'", [`%${escapeLike(term)}%`])
    .whereNotIn("id", excluded)
    .orderBy("name", "asc")
    .limit(SEARCH_LIMIT);
  return rows.map(toSummary);
};
