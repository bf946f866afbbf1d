/**
 * Key bindings. Translates an Ink key press into an Action for the
 * current mode; null means the key does nothing here.
 */

import type { FilterName } from "@berth/core";
import type { Key } from "ink";
import type { Action } from "./actions";
import type { SessionState } from "./state/session";

/** The subset of Ink's key flags the bindings look at */
export type KeyPress = Partial<
  Pick<
    Key,
    | "upArrow"
    | "downArrow"
    | "return"
    | "escape"
    | "ctrl"
    | "shift"
    | "tab"
    | "backspace"
    | "delete"
    | "meta"
  >
>;

const FILTER_KEYS: Record<string, FilterName> = {
  "0": "all",
  "1": "local",
  "2": "ssh",
  "3": "docker"
};

function isErase(key: KeyPress): boolean {
  return Boolean(key.backspace || key.delete);
}

function isText(input: string, key: KeyPress): boolean {
  return input.length > 0 && !key.ctrl && !key.meta && !key.tab;
}

export function normalKey(input: string, key: KeyPress): Action | null {
  if (key.escape) return { type: "quit" };
  if (key.return) return { type: "details" };
  if (key.downArrow) return { type: "next" };
  if (key.upArrow) return { type: "previous" };

  const filter = FILTER_KEYS[input];
  if (filter) return { type: "filter", filter };

  switch (input) {
    case "q":
      return { type: "quit" };
    case "j":
      return { type: "next" };
    case "k":
      return { type: "previous" };
    case "g":
      return { type: "first" };
    case "G":
      return { type: "last" };
    case "/":
      return { type: "enterSearch" };
    case "?":
      return { type: "help" };
    case "r":
      return { type: "refresh" };
    case "a":
      return { type: "toggleAutoRefresh" };
    case "f":
      return { type: "startForward" };
    case "F":
      return { type: "quickForward" };
    case "p":
      return { type: "showPresets" };
    case "c":
      return { type: "showConnections" };
    case "h":
      return { type: "switchConnection", direction: -1 };
    case "l":
      return { type: "switchConnection", direction: 1 };
    case "K":
      return { type: "kill" };
    default:
      return null;
  }
}

export function searchKey(input: string, key: KeyPress): Action | null {
  if (key.escape || key.return) return { type: "exitSearch" };
  if (isErase(key)) return { type: "searchBackspace" };
  if (isText(input, key)) return { type: "searchInput", text: input };
  return null;
}

export function forwardKey(input: string, key: KeyPress): Action | null {
  if (key.escape) return { type: "closePopup" };
  if (key.return) return { type: "submitForward" };
  if (key.tab) return { type: "forwardField", direction: key.shift ? -1 : 1 };
  if (key.downArrow) return { type: "forwardField", direction: 1 };
  if (key.upArrow) return { type: "forwardField", direction: -1 };
  if (isErase(key)) return { type: "forwardBackspace" };
  if (isText(input, key)) return { type: "forwardInput", text: input };
  return null;
}

export function presetKey(
  input: string,
  key: KeyPress,
  state: SessionState
): Action | null {
  if (key.escape || input === "q") return { type: "closePopup" };
  if (key.return) return { type: "launchPreset" };
  if (key.downArrow || input === "j") return { type: "presetNext" };
  if (key.upArrow || input === "k") return { type: "presetPrevious" };

  const index = input ? state.presets.findIndex((p) => p.key === input) : -1;
  if (index !== -1) return { type: "launchPreset", index };
  return null;
}

export function connectionKey(
  input: string,
  key: KeyPress,
  state: SessionState
): Action | null {
  if (state.connectionPopupMode === "add") {
    if (key.escape) return { type: "cancelAddConnection" };
    if (key.return) return { type: "saveConnection" };
    if (key.tab) {
      return { type: "connectionField", direction: key.shift ? -1 : 1 };
    }
    if (key.downArrow) return { type: "connectionField", direction: 1 };
    if (key.upArrow) return { type: "connectionField", direction: -1 };
    if (isErase(key)) return { type: "connectionBackspace" };
    if (isText(input, key)) return { type: "connectionInput", text: input };
    return null;
  }

  if (key.escape || input === "q") return { type: "closePopup" };
  if (key.return) return { type: "activateConnection" };
  if (key.downArrow || input === "j") return { type: "connectionNext" };
  if (key.upArrow || input === "k") return { type: "connectionPrevious" };
  if (input === "a") return { type: "startAddConnection" };
  if (input === "d") return { type: "deleteConnection" };
  return null;
}

/** Details and help: any of Esc, Enter or q closes */
export function infoPopupKey(input: string, key: KeyPress): Action | null {
  if (key.escape || key.return || input === "q") return { type: "closePopup" };
  return null;
}

/**
 * Route a key press by the session's current mode. Ctrl-C quits from
 * anywhere.
 */
export function keyToAction(
  state: SessionState,
  input: string,
  key: KeyPress
): Action | null {
  if (key.ctrl && input === "c") return { type: "quit" };

  switch (state.popup) {
    case "forward":
      return forwardKey(input, key);
    case "presets":
      return presetKey(input, key, state);
    case "connections":
      return connectionKey(input, key, state);
    case "details":
    case "help":
      return infoPopupKey(input, key);
    case "none":
      return state.inputMode === "search"
        ? searchKey(input, key)
        : normalKey(input, key);
  }
}
