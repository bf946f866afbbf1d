export { App } from "./App";
export type { Action } from "./actions";
export { Dispatcher, transitionFor } from "./dispatcher";
export { keyToAction } from "./keys";
export type { KeyPress } from "./keys";
export { mockRecords } from "./mock";
export { type TuiOptions, runTui } from "./run";
export { type PortService, createPortService } from "./service";
export * from "./state/connection-draft";
export * from "./state/forward-draft";
export * from "./state/session";
export { type SessionStore, type StoreListener, createStore } from "./store";
