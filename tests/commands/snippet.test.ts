/**
 * Tests for snippet command
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { snippetCommand } from "../../src/commands/snippet";
import { parseArgs } from "../../src/cli/parser";
import {
  captureConsole,
  createSnippet,
  makeEngineHarness,
  runTest,
  runTestExpectFailure,
  withEngine,
  type ConsoleCapture,
} from "../utils";

const SNIPPET_ID = "dddd4444-0000-0000-0000-000000000004";

const withGreeting = () =>
  makeEngineHarness({ snippets: [createSnippet({ id: SNIPPET_ID, category: "Mail" })] });

const snippet = (...args: string[]) => snippetCommand(parseArgs(["snippet", ...args]));

let output: ConsoleCapture;

beforeEach(() => {
  output = captureConsole();
});

afterEach(() => {
  output.restore();
});

describe("snippetCommand", () => {
  test("lists snippets with their category", async () => {
    await runTest(withEngine(withGreeting(), snippet()));
    expect(output.logs).toEqual(["dddd4444  Greeting  [Mail]"]);
  });

  test("empty list", async () => {
    await runTest(withEngine(makeEngineHarness(), snippet("list")));
    expect(output.logs).toEqual(["No snippets."]);
  });

  test("add joins the remaining words into the content", async () => {
    const harness = makeEngineHarness();
    await runTest(withEngine(harness, snippet("add", "Sign-off", "Best", "regards,", "{name}", "-c", "Mail")));

    const [saved] = harness.store.snippets;
    expect(saved?.title).toBe("Sign-off");
    expect(saved?.content).toBe("Best regards, {name}");
    expect(saved?.category).toBe("Mail");
    expect(output.logs).toEqual([`Saved snippet ${saved?.id.slice(0, 8)}: Sign-off`]);
  });

  test("add requires content", async () => {
    const error = await runTestExpectFailure(withEngine(makeEngineHarness(), snippet("add", "Empty")));
    expect(error._tag).toBe("ValidationError");
  });

  test("show prints placeholders and content", async () => {
    await runTest(withEngine(withGreeting(), snippet("show", "dddd")));
    expect(output.logs).toEqual([
      "Title:         Greeting",
      "Category:      Mail",
      "Placeholders:  name",
      "",
      "Hello {name}",
    ]);
  });

  test("use fills placeholders and records the use", async () => {
    const harness = withGreeting();
    await runTest(withEngine(harness, snippet("use", "dddd", "name=Ada")));

    expect(output.logs).toEqual(["Hello Ada"]);
    expect(harness.store.snippets[0]?.lastUsedAt).toBeInstanceOf(Date);
    expect(harness.autoPaste.contents).toEqual([]);
  });

  test("use --copy also puts the text on the clipboard", async () => {
    const harness = withGreeting();
    await runTest(withEngine(harness, snippet("use", "dddd", "name=Ada", "--copy")));
    expect(harness.autoPaste.contents).toEqual(["Hello Ada"]);
  });

  test("use rejects values without an equals sign", async () => {
    const error = await runTestExpectFailure(withEngine(withGreeting(), snippet("use", "dddd", "Ada")));
    expect(error.message).toBe('Expected name=value, got "Ada"');
  });

  test("rm deletes the snippet", async () => {
    const harness = withGreeting();
    await runTest(withEngine(harness, snippet("rm", "dddd")));

    expect(output.logs).toEqual(["Deleted snippet dddd4444"]);
    expect(harness.store.snippets).toEqual([]);
  });

  test("unknown snippets are not found", async () => {
    const error = await runTestExpectFailure(withEngine(withGreeting(), snippet("rm", "eeee")));
    expect(error._tag).toBe("SnippetNotFoundError");
  });
});
