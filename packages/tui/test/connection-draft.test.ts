import { describe, expect, test } from "vitest";
import {
  backspaceConnection,
  cycleConnectionField,
  emptyConnectionDraft,
  toConnection,
  typeIntoConnection
} from "../src/state/connection-draft";

describe("connection draft", () => {
  test("cycles through the three fields and wraps", () => {
    let draft = emptyConnectionDraft();
    draft = cycleConnectionField(draft, 1);
    expect(draft.activeField).toBe("remoteHost");
    draft = cycleConnectionField(draft, 1);
    expect(draft.activeField).toBe("dockerTarget");
    draft = cycleConnectionField(draft, 1);
    expect(draft.activeField).toBe("name");
    expect(cycleConnectionField(draft, -1).activeField).toBe("dockerTarget");
  });

  test("edits the active field", () => {
    let draft = typeIntoConnection(emptyConnectionDraft(), "prod");
    draft = backspaceConnection(draft);
    expect(draft.name).toBe("pro");
  });

  test("requires a name", () => {
    expect(toConnection({ ...emptyConnectionDraft(), name: "   " })).toBeNull();
  });

  test("trims values and drops blank optional fields", () => {
    expect(
      toConnection({
        ...emptyConnectionDraft(),
        name: " prod ",
        remoteHost: " user@prod ",
        dockerTarget: " "
      })
    ).toEqual({ name: "prod", remoteHost: "user@prod", dockerTarget: undefined });
  });
});
