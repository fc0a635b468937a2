export * as Config from "./config_manager";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as Rules from "./matching_rules";
export * as Releases from "./release_types";

// Extraction engine
export * as Normalizer from "./text_normalizer";
export * as Resolver from "./app_name_resolver";
export * as Extraction from "./field_extractors";
export * as Builder from "./record_builder";
export * as Merger from "./reply_merger";
export * as Reducer from "./release_reducer";

// Output
export * as Renderer from "./renderer";

// Source and sink contracts
export * as Source from "./message_source";
export * as Sink from "./page_sink";
export * as Transport from "./transport";

// Orchestration
export * as Tracker from "./release_tracker";
