export * from "./schema/calendar_date_v1";
export * from "./schema/season_v1";
export * from "./schema/temperature_sample_v1";
export * from "./schema/daily_mean_v1";
export * from "./schema/engine_state_v1";
export * from "./schema/manual_override_v1";
export * from "./schema/season_status_v1";
