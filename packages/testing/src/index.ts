export * from "./fakes/hosting/FakeContentSource.js";
export * from "./fakes/channels/FakeEventChannel.js";
