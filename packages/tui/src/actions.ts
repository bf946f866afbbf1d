import type { FilterName } from "@berth/core";

/** Everything a key press can ask the dispatcher to do */
export type Action =
  | { type: "quit" }
  | { type: "next" }
  | { type: "previous" }
  | { type: "first" }
  | { type: "last" }
  | { type: "enterSearch" }
  | { type: "exitSearch" }
  | { type: "searchInput"; text: string }
  | { type: "searchBackspace" }
  | { type: "filter"; filter: FilterName }
  | { type: "refresh" }
  | { type: "toggleAutoRefresh" }
  | { type: "kill" }
  | { type: "details" }
  | { type: "help" }
  | { type: "closePopup" }
  | { type: "startForward" }
  | { type: "quickForward" }
  | { type: "forwardField"; direction: 1 | -1 }
  | { type: "forwardInput"; text: string }
  | { type: "forwardBackspace" }
  | { type: "submitForward" }
  | { type: "showPresets" }
  | { type: "presetNext" }
  | { type: "presetPrevious" }
  | { type: "launchPreset"; index?: number }
  | { type: "showConnections" }
  | { type: "switchConnection"; direction: 1 | -1 }
  | { type: "connectionNext" }
  | { type: "connectionPrevious" }
  | { type: "activateConnection" }
  | { type: "startAddConnection" }
  | { type: "deleteConnection" }
  | { type: "connectionField"; direction: 1 | -1 }
  | { type: "connectionInput"; text: string }
  | { type: "connectionBackspace" }
  | { type: "saveConnection" }
  | { type: "cancelAddConnection" };
