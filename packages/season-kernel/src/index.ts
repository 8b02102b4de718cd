// @seasonwatch/season-kernel
// Entry point exports for the Season Rule Engine.

export * from "./kernel";
export * from "./calendar/calendar_date";
export * from "./catalog/season_catalog";
export * from "./aggregate/sample_aggregator";
export * from "./counters/counter_bank";
export * from "./ledger/arrival_ledger";
export * from "./ledger/rollover";
export * from "./resolve/current_season";
export * from "./state/engine_state";
export * from "./events/engine_event";
export * from "./status/locale";
export * from "./status/status";
