export * from "./repository/RepositoryRef.js";
export * from "./errors/AnalysisErrors.js";
export * from "./events/EventEnvelope.js";
export * from "./async/TimeoutSignal.js";
