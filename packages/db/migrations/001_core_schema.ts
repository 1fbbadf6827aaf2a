import { Knex } from "knex";
import { isPostgres } from "../src/dialect.js";

const timestamps = (knex: Knex, table: Knex.CreateTableBuilder) => {
  table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
};

export async function up(knex: Knex): Promise<void> {
  const postgres = isPostgres(knex);

  await knex.schema.createTable("parent_profiles", (table) => {
    table.uuid("id").primary();
    table.text("subject").notNullable().unique();
    table.text("email").notNullable();
    table.text("name");
    timestamps(knex, table);
  });

  await knex.schema.createTable("child_profiles", (table) => {
    table.uuid("id").primary();
    table
      .uuid("parent_id")
      .notNullable()
      .references("id")
      .inTable("parent_profiles")
      .onDelete("CASCADE");
    table.text("name").notNullable();
    table.text("age_group").notNullable();
    table.text("avatar");
    table.boolean("voice_clone_enabled").notNullable().defaultTo(false);
    table.text("voice_clone_id");
    table.boolean("is_online").notNullable().defaultTo(false);
    table.timestamp("last_seen_at", { useTz: true });
    // game_rooms references this table too; Postgres gets the foreign key once both exist.
    if (postgres) {
      table.uuid("room_id");
    } else {
      table.uuid("room_id").references("id").inTable("game_rooms").onDelete("SET NULL");
    }
    timestamps(knex, table);
    table.index(["parent_id"]);
    table.index(["room_id"]);
  });

  await knex.schema.createTable("game_rooms", (table) => {
    table.uuid("id").primary();
    table.text("room_code").notNullable().unique();
    table
      .uuid("host_child_id")
      .notNullable()
      .references("id")
      .inTable("child_profiles")
      .onDelete("CASCADE");
    table.text("game_id").notNullable();
    table.text("difficulty").notNullable();
    table.integer("max_players").notNullable().defaultTo(4);
    table.integer("current_players").notNullable().defaultTo(1);
    table.enu("status", ["waiting", "playing", "finished"]).notNullable().defaultTo("waiting");
    table.boolean("has_ai_player").notNullable().defaultTo(false);
    table.text("ai_player_name");
    table.text("ai_player_avatar");
    table.text("selected_category");
    timestamps(knex, table);
    table.check(
      "current_players >= 0 and current_players <= max_players",
      {},
      "game_rooms_occupancy_check"
    );
    table.index(["host_child_id"]);
  });

  if (postgres) {
    await knex.schema.alterTable("child_profiles", (table) => {
      table.foreign("room_id").references("id").inTable("game_rooms").onDelete("SET NULL");
    });
  }

  await knex.schema.createTable("room_participants", (table) => {
    table.uuid("id").primary();
    table.uuid("room_id").notNullable().references("id").inTable("game_rooms").onDelete("CASCADE");
    table.uuid("child_id").references("id").inTable("child_profiles").onDelete("CASCADE");
    table.text("player_name").notNullable();
    table.text("player_avatar");
    table.boolean("is_ai").notNullable().defaultTo(false);
    table.timestamp("joined_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.unique(["room_id", "child_id"]);
    table.index(["child_id"]);
  });

  await knex.schema.createTable("join_requests", (table) => {
    table.uuid("id").primary();
    table.uuid("room_id").references("id").inTable("game_rooms").onDelete("CASCADE");
    table.text("room_code").notNullable();
    table
      .uuid("child_id")
      .notNullable()
      .references("id")
      .inTable("child_profiles")
      .onDelete("CASCADE");
    table
      .uuid("invited_by_child_id")
      .references("id")
      .inTable("child_profiles")
      .onDelete("SET NULL");
    table.enu("kind", ["invite", "request"]).notNullable();
    table.text("player_name").notNullable();
    table.text("player_avatar");
    table.enu("status", ["pending", "approved", "denied"]).notNullable().defaultTo("pending");
    timestamps(knex, table);
    table.index(["child_id", "status"]);
    table.index(["room_code"]);
  });

  await knex.schema.createTable("friends", (table) => {
    table.uuid("id").primary();
    table
      .uuid("requester_id")
      .notNullable()
      .references("id")
      .inTable("child_profiles")
      .onDelete("CASCADE");
    table
      .uuid("addressee_id")
      .notNullable()
      .references("id")
      .inTable("child_profiles")
      .onDelete("CASCADE");
    table.enu("status", ["pending", "accepted", "blocked"]).notNullable().defaultTo("pending");
    timestamps(knex, table);
    table.unique(["requester_id", "addressee_id"]);
    table.check("requester_id <> addressee_id", {}, "friends_distinct_pair_check");
    table.index(["addressee_id", "status"]);
  });

  // One edge per unordered pair, whichever side asked first.
  const least = postgres ? "least" : "min";
  const greatest = postgres ? "greatest" : "max";
  await knex.raw(
    `create unique index friends_unordered_pair_unique on friends (${least}(requester_id, addressee_id), ${greatest}(requester_id, addressee_id))`
  );

  await knex.schema.createTable("game_sessions", (table) => {
    table.uuid("id").primary();
    table.uuid("room_id").notNullable().references("id").inTable("game_rooms").onDelete("CASCADE");
    table.jsonb("game_data");
    table.uuid("current_turn_player_id");
    table.enu("game_state", ["active", "paused", "finished"]).notNullable().defaultTo("active");
    timestamps(knex, table);
    table.index(["room_id", "game_state"]);
  });

  await knex.schema.createTable("game_scores", (table) => {
    table.uuid("id").primary();
    table.uuid("room_id").notNullable().references("id").inTable("game_rooms").onDelete("CASCADE");
    table.uuid("session_id").references("id").inTable("game_sessions").onDelete("SET NULL");
    table.uuid("child_id").references("id").inTable("child_profiles").onDelete("CASCADE");
    table.text("player_name").notNullable();
    table.text("player_avatar");
    table.boolean("is_ai").notNullable().defaultTo(false);
    table.integer("score").notNullable().defaultTo(0);
    table.integer("total_questions").notNullable().defaultTo(0);
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["room_id"]);
  });

  await knex.schema.createTable("generated_stories", (table) => {
    table.uuid("id").primary();
    table
      .uuid("child_id")
      .notNullable()
      .references("id")
      .inTable("child_profiles")
      .onDelete("CASCADE");
    table.text("title").notNullable();
    table.text("content").notNullable();
    table.text("prompt");
    table.text("audio_url");
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.index(["child_id"]);
  });

  await knex.schema.createTable("voice_subscriptions", (table) => {
    table.uuid("id").primary();
    table
      .uuid("parent_id")
      .notNullable()
      .unique()
      .references("id")
      .inTable("parent_profiles")
      .onDelete("CASCADE");
    table.text("stripe_subscription_id");
    table.text("stripe_customer_id");
    table
      .enu("status", ["inactive", "active", "past_due", "cancelled"])
      .notNullable()
      .defaultTo("inactive");
    table.text("plan_type").notNullable().defaultTo("basic");
    timestamps(knex, table);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("voice_subscriptions");
  await knex.schema.dropTableIfExists("generated_stories");
  await knex.schema.dropTableIfExists("game_scores");
  await knex.schema.dropTableIfExists("game_sessions");
  await knex.schema.dropTableIfExists("friends");
  await knex.schema.dropTableIfExists("join_requests");
  await knex.schema.dropTableIfExists("room_participants");
  if (isPostgres(knex)) {
    await knex.schema.alterTable("child_profiles", (table) => {
      table.dropForeign(["room_id"]);
    });
  }
  await knex.schema.dropTableIfExists("game_rooms");
  await knex.schema.dropTableIfExists("child_profiles");
  await knex.schema.dropTableIfExists("parent_profiles");
}
