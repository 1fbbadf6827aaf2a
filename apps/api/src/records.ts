// Row shapes as they come back from either driver (pg returns Date/boolean/object,
// SQLite returns string/0-1/JSON text) and the response models they map to.

type Timestamp = Date | string;
type Flag = boolean | number;

export const nowIso = () => new Date().toISOString();

const toIso = (value: Timestamp) =>
  value instanceof Date ? value.toISOString() : new Date(value).toISOString();

const toIsoOrNull = (value: Timestamp | null) => (value === null ? null : toIso(value));

const toFlag = (value: Flag) => value === true || value === 1;

const parseJson = (value: unknown): unknown =>
  typeof value === "string" ? JSON.parse(value) : (value ?? null);

export type ParentRow = {
  id: string;
  subject: string;
  email: string;
  name: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type ParentProfile = {
  id: string;
  subject: string;
  email: string;
  name: string | null;
  createdAt: string;
  updatedAt: string;
};

export const toParentProfile = (row: ParentRow): ParentProfile => ({
  id: row.id,
  subject: row.subject,
  email: row.email,
  name: row.name,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});

export type ChildRow = {
  id: string;
  parent_id: string;
  name: string;
  age_group: string;
  avatar: string | null;
  voice_clone_enabled: Flag;
  voice_clone_id: string | null;
  is_online: Flag;
  last_seen_at: Timestamp | null;
  room_id: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type ChildProfile = {
  id: string;
  parentId: string;
  name: string;
  ageGroup: string;
  avatar: string | null;
  voiceCloneEnabled: boolean;
  voiceCloneId: string | null;
  isOnline: boolean;
  lastSeenAt: string | null;
  inRoom: boolean;
  roomId: string | null;
  createdAt: string;
  updatedAt: string;
};

export const toChildProfile = (row: ChildRow): ChildProfile => ({
  id: row.id,
  parentId: row.parent_id,
  name: row.name,
  ageGroup: row.age_group,
  avatar: row.avatar,
  voiceCloneEnabled: toFlag(row.voice_clone_enabled),
  voiceCloneId: row.voice_clone_id,
  isOnline: toFlag(row.is_online),
  lastSeenAt: toIsoOrNull(row.last_seen_at),
  inRoom: row.room_id !== null,
  roomId: row.room_id,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});

export type FriendStatus = "pending" | "accepted" | "blocked";

export type FriendRow = {
  id: string;
  requester_id: string;
  addressee_id: string;
  status: FriendStatus;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type FriendEdge = {
  id: string;
  requesterId: string;
  addresseeId: string;
  status: FriendStatus;
  createdAt: string;
  updatedAt: string;
};

export const toFriendEdge = (row: FriendRow): FriendEdge => ({
  id: row.id,
  requesterId: row.requester_id,
  addresseeId: row.addressee_id,
  status: row.status,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});

export type RoomStatus = "waiting" | "playing" | "finished";

export type RoomRow = {
  id: string;
  room_code: string;
  host_child_id: string;
  game_id: string;
  difficulty: string;
  max_players: number;
  current_players: number;
  status: RoomStatus;
  has_ai_player: Flag;
  ai_player_name: string | null;
  ai_player_avatar: string | null;
  selected_category: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type ParticipantRow = {
  id: string;
  room_id: string;
  child_id: string | null;
  player_name: string;
  player_avatar: string | null;
  is_ai: Flag;
  joined_at: Timestamp;
};

export type RoomParticipant = {
  id: string;
  roomId: string;
  childId: string | null;
  playerName: string;
  playerAvatar: string | null;
  isAi: boolean;
  joinedAt: string;
};

export type GameRoom = {
  id: string;
  roomCode: string;
  hostChildId: string;
  gameId: string;
  difficulty: string;
  maxPlayers: number;
  currentPlayers: number;
  status: RoomStatus;
  hasAiPlayer: boolean;
  aiPlayerName: string | null;
  aiPlayerAvatar: string | null;
  selectedCategory: string | null;
  createdAt: string;
  updatedAt: string;
  participants?: RoomParticipant[];
};

export const toRoomParticipant = (row: ParticipantRow): RoomParticipant => ({
  id: row.id,
  roomId: row.room_id,
  childId: row.child_id,
  playerName: row.player_name,
  playerAvatar: row.player_avatar,
  isAi: toFlag(row.is_ai),
  joinedAt: toIso(row.joined_at)
});

export const toGameRoom = (row: RoomRow, participants?: ParticipantRow[]): GameRoom => ({
  id: row.id,
  roomCode: row.room_code,
  hostChildId: row.host_child_id,
  gameId: row.game_id,
  difficulty: row.difficulty,
  maxPlayers: Number(row.max_players),
  currentPlayers: Number(row.current_players),
  status: row.status,
  hasAiPlayer: toFlag(row.has_ai_player),
  aiPlayerName: row.ai_player_name,
  aiPlayerAvatar: row.ai_player_avatar,
  selectedCategory: row.selected_category,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at),
  ...(participants ? { participants: participants.map(toRoomParticipant) } : {})
});

export type JoinRequestKind = "invite" | "request";
export type JoinRequestStatus = "pending" | "approved" | "denied";

export type JoinRequestRow = {
  id: string;
  room_id: string | null;
  room_code: string;
  child_id: string;
  invited_by_child_id: string | null;
  kind: JoinRequestKind;
  player_name: string;
  player_avatar: string | null;
  status: JoinRequestStatus;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type JoinRequest = {
  id: string;
  roomId: string | null;
  roomCode: string;
  childId: string;
  invitedByChildId: string | null;
  kind: JoinRequestKind;
  playerName: string;
  playerAvatar: string | null;
  status: JoinRequestStatus;
  createdAt: string;
  updatedAt: string;
};

export const toJoinRequest = (row: JoinRequestRow): JoinRequest => ({
  id: row.id,
  roomId: row.room_id,
  roomCode: row.room_code,
  childId: row.child_id,
  invitedByChildId: row.invited_by_child_id,
  kind: row.kind,
  playerName: row.player_name,
  playerAvatar: row.player_avatar,
  status: row.status,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});

export type GameState = "active" | "paused" | "finished";

export type SessionRow = {
  id: string;
  room_id: string;
  game_data: unknown;
  current_turn_player_id: string | null;
  game_state: GameState;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type GameSession = {
  id: string;
  roomId: string;
  gameData: unknown;
  currentTurnPlayerId: string | null;
  gameState: GameState;
  createdAt: string;
  updatedAt: string;
};

export const toGameSession = (row: SessionRow): GameSession => ({
  id: row.id,
  roomId: row.room_id,
  gameData: parseJson(row.game_data),
  currentTurnPlayerId: row.current_turn_player_id,
  gameState: row.game_state,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});

export type ScoreRow = {
  id: string;
  room_id: string;
  session_id: string | null;
  child_id: string | null;
  player_name: string;
  player_avatar: string | null;
  is_ai: Flag;
  score: number;
  total_questions: number;
  created_at: Timestamp;
};

export type GameScore = {
  id: string;
  roomId: string;
  sessionId: string | null;
  childId: string | null;
  playerName: string;
  playerAvatar: string | null;
  isAi: boolean;
  score: number;
  totalQuestions: number;
  createdAt: string;
};

export const toGameScore = (row: ScoreRow): GameScore => ({
  id: row.id,
  roomId: row.room_id,
  sessionId: row.session_id,
  childId: row.child_id,
  playerName: row.player_name,
  playerAvatar: row.player_avatar,
  isAi: toFlag(row.is_ai),
  score: Number(row.score),
  totalQuestions: Number(row.total_questions),
  createdAt: toIso(row.created_at)
});

export type StoryRow = {
  id: string;
  child_id: string;
  title: string;
  content: string;
  prompt: string | null;
  audio_url: string | null;
  created_at: Timestamp;
};

export type GeneratedStory = {
  id: string;
  childId: string;
  title: string;
  content: string;
  prompt: string | null;
  audioUrl: string | null;
  createdAt: string;
};

export const toGeneratedStory = (row: StoryRow): GeneratedStory => ({
  id: row.id,
  childId: row.child_id,
  title: row.title,
  content: row.content,
  prompt: row.prompt,
  audioUrl: row.audio_url,
  createdAt: toIso(row.created_at)
});

export type SubscriptionStatus = "inactive" | "active" | "past_due" | "cancelled";

export type SubscriptionRow = {
  id: string;
  parent_id: string;
  stripe_subscription_id: string | null;
  stripe_customer_id: string | null;
  status: SubscriptionStatus;
  plan_type: string;
  created_at: Timestamp;
  updated_at: Timestamp;
};

export type VoiceSubscription = {
  id: string;
  parentId: string;
  stripeSubscriptionId: string | null;
  stripeCustomerId: string | null;
  status: SubscriptionStatus;
  planType: string;
  createdAt: string;
  updatedAt: string;
};

export const toVoiceSubscription = (row: SubscriptionRow): VoiceSubscription => ({
  id: row.id,
  parentId: row.parent_id,
  stripeSubscriptionId: row.stripe_subscription_id,
  stripeCustomerId: row.stripe_customer_id,
  status: row.status,
  planType: row.plan_type,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at)
});
