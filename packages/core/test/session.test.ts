import { afterEach, describe, expect, it, vi } from "vitest";
import { KeyInputController } from "../src/input/key-input.js";
import type { PlayerView } from "../src/password/types.js";
import { createRNG } from "../src/puzzle/rng.js";
import { PasswordSession } from "../src/session/password-session.js";

const WINNING = "May111221.c5";

function typeInto(session: PasswordSession, text: string) {
  for (const ch of text) session.appendCharacter(ch);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("PasswordSession", () => {
  it("exposes the initial state to renderers", () => {
    const session = new PasswordSession({ iterations: 3 });
    const view = session.getView();
    expect(view.text).toBe("");
    expect(view.currentGateIndex).toBe(0);
    expect(view.satisfiedIndices).toEqual([]);
    expect(view.allSatisfied).toBe(false);
    expect(view.lastSequence).toBe("1211");
    expect(session.isComplete()).toBe(false);
  });

  it("appends allowed characters and rejects the rest", () => {
    const session = new PasswordSession({ iterations: 3 });
    expect(session.appendCharacter("a")).toBe(true);
    expect(session.appendCharacter(" ")).toBe(false);
    expect(session.appendCharacter("bc")).toBe(false);
    expect(session.text).toBe("a");
  });

  it("reaches completion and wins on submit", () => {
    const session = new PasswordSession({ iterations: 3 });
    typeInto(session, WINNING);
    expect(session.isComplete()).toBe(true);
    expect(session.getView().allSatisfied).toBe(true);

    expect(session.submit()).toBe(true);
    expect(session.getView().status).toBe("WON");
    expect(session.isOver).toBe(true);
    expect(session.appendCharacter("x")).toBe(false);
    expect(session.text).toBe(WINNING);
  });

  it("stays playing after an early submit", () => {
    const session = new PasswordSession({ iterations: 3 });
    typeInto(session, "abcde");
    expect(session.submit()).toBe(false);
    expect(session.getView()).toMatchObject({
      status: "PLAYING",
      feedback: "Password does not meet the requirements.",
    });
  });

  it("removes the last character and re-evaluates", () => {
    const session = new PasswordSession({ iterations: 3 });
    typeInto(session, "abcde");
    expect(session.getView().currentGateIndex).toBe(1);
    session.removeLastCharacter();
    expect(session.text).toBe("abcd");
    expect(session.getView().currentGateIndex).toBe(0);
  });

  it("counts astral letters as one character each", () => {
    const session = new PasswordSession({ iterations: 3 });
    expect(["𝐀", "𝐁", "c"].map((ch) => session.appendCharacter(ch))).toEqual([
      true,
      true,
      true,
    ]);
    expect(session.getView().currentGateIndex).toBe(0);
    typeInto(session, "de");
    expect(session.getView().currentGateIndex).toBe(1);
    session.removeLastCharacter();
    expect(session.text).toBe("𝐀𝐁cd");
    expect(session.getView().currentGateIndex).toBe(0);
  });

  it("notifies subscribers immediately and after each accepted edit", () => {
    const session = new PasswordSession({ iterations: 3 });
    const views: PlayerView[] = [];
    const unsubscribe = session.subscribe((view) => views.push(view));
    expect(views).toHaveLength(1);

    session.removeLastCharacter();
    session.appendCharacter("~");
    expect(views).toHaveLength(1);

    session.appendCharacter("a");
    expect(views).toHaveLength(2);
    expect(views[1].text).toBe("a");

    unsubscribe();
    session.appendCharacter("b");
    expect(views).toHaveLength(2);
  });

  it("draws the same puzzle for the same seed", () => {
    const a = new PasswordSession({ rng: createRNG("test-seed") });
    const b = new PasswordSession({ rng: createRNG("test-seed") });
    expect(a.seed).toEqual(b.seed);
  });

  it("logs gate changes when output is enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const session = new PasswordSession({ iterations: 3, output: true });
    typeInto(session, "abcde");
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[PasswordSession] gate 0 -> 1 of 11");

    session.terminate("quit");
    expect(log).toHaveBeenLastCalledWith(
      "[PasswordSession] status ENDED (quit) after 6 actions",
    );
  });

  it("stays silent by default", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const session = new PasswordSession({ iterations: 3 });
    typeInto(session, "abcde");
    expect(log).not.toHaveBeenCalled();
  });
});

describe("KeyInputController", () => {
  const isDisallowed = (candidate: string) => candidate.includes("badword");

  function setup() {
    const session = new PasswordSession({ iterations: 3 });
    const input = new KeyInputController(session, { isDisallowed });
    return { session, input };
  }

  it("types characters and skips disallowed ones", () => {
    const { session, input } = setup();
    expect(input.handle({ input: "A" })).toBe("edited");
    expect(input.handle({ input: "~" })).toBe("ignored");
    expect(input.handle({ input: "b~c" })).toBe("edited");
    expect(session.text).toBe("Abc");
  });

  it("ignores other control chords", () => {
    const { session, input } = setup();
    expect(input.handle({ input: "a", ctrl: true })).toBe("ignored");
    expect(session.text).toBe("");
  });

  it("maps backspace and delete to removing a character", () => {
    const { session, input } = setup();
    expect(input.handle({ input: "", backspace: true })).toBe("ignored");
    input.handle({ input: "ab" });
    expect(input.handle({ input: "", backspace: true })).toBe("edited");
    expect(input.handle({ input: "", delete: true })).toBe("edited");
    expect(session.text).toBe("");
  });

  it("submits on return", () => {
    const { input } = setup();
    input.handle({ input: "abcde" });
    expect(input.handle({ input: "\r", return: true })).toBe("submitted");
    input.handle({ input: "", backspace: true });
    input.handle({ input: "", backspace: true });
    input.handle({ input: "", backspace: true });
    input.handle({ input: "", backspace: true });
    input.handle({ input: "", backspace: true });
    input.handle({ input: WINNING });
    expect(input.handle({ input: "\r", return: true })).toBe("won");
  });

  it("ends the session before a flagged edit is committed", () => {
    const { session, input } = setup();
    input.handle({ input: "badwor" });
    expect(input.handle({ input: "d" })).toBe("ended");
    expect(session.text).toBe("badwor");
    expect(session.getView()).toMatchObject({
      status: "ENDED",
      endReason: "profanity",
    });
    expect(input.handle({ input: "x" })).toBe("ignored");
  });

  it("quits on escape and ctrl+c", () => {
    const first = setup();
    expect(first.input.handle({ input: "", escape: true })).toBe("ended");
    expect(first.session.getView().endReason).toBe("quit");

    const second = setup();
    expect(second.input.handle({ input: "c", ctrl: true })).toBe("ended");
    expect(second.session.getView().endReason).toBe("quit");
  });
});
