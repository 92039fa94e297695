/**
 * snippet command - Manage reusable text snippets
 *
 * Usage:
 *   clipvault snippet                                  List snippets
 *   clipvault snippet add <title> <content> [-c cat]  Save a snippet
 *   clipvault snippet show <id>                        Show content and placeholders
 *   clipvault snippet rm <id>                          Delete a snippet
 *   clipvault snippet use <id> [name=value...] [--copy]
 *                                                      Fill placeholders and print
 *
 * Snippet content uses {name} placeholders.
 */

import { Effect } from "effect";
import { SnippetCommandArgsSchema, SnippetNotFoundError, ValidationError } from "../models";
import { makeTextItem } from "../models/clipboard-item";
import { getPlaceholders, makeSnippet } from "../models/snippet";
import { AutoPasteService } from "../services/auto-paste-service";
import { ClipboardEngine } from "../services/clipboard-engine";
import { booleanFlag, stringFlag, type ParsedArgs } from "../cli/parser";
import { decodeArgs, preview, resolveRef, shortId } from "./shared";

const USAGE =
  "clipvault snippet [list | add <title> <content> [-c <category>] | show <id> | rm <id> | use <id> [name=value...]]";

/**
 * `name=value` arguments to a record; anything else is a validation error
 */
const parseValues = (pairs: ReadonlyArray<string>): Effect.Effect<Record<string, string>, ValidationError> =>
  Effect.gen(function* () {
    const values: Record<string, string> = {};
    for (const pair of pairs) {
      const eqIndex = pair.indexOf("=");
      if (eqIndex <= 0) {
        return yield* Effect.fail(
          new ValidationError({ field: "values", message: `Expected name=value, got "${pair}"` })
        );
      }
      values[pair.slice(0, eqIndex)] = pair.slice(eqIndex + 1);
    }
    return values;
  });

const parseSnippetArgs = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const [action = "list", ...rest] = args.positional;
    switch (action) {
      case "add":
        return {
          action,
          title: rest[0],
          content: rest.slice(1).join(" "),
          category: stringFlag(args, "category", "c"),
        };
      case "use":
        return { action, ref: rest[0], values: yield* parseValues(rest.slice(1)) };
      case "show":
      case "rm":
        return { action, ref: rest[0] };
      default:
        return { action };
    }
  });

const snippetIds = (ids: ReadonlyArray<{ readonly id: string }>) => ids.map((snippet) => snippet.id);

export const snippetCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const engine = yield* ClipboardEngine;
    const validatedArgs = yield* decodeArgs(
      SnippetCommandArgsSchema,
      yield* parseSnippetArgs(args),
      USAGE
    );

    switch (validatedArgs.action) {
      case "list": {
        const snippets = yield* engine.snippets;
        if (snippets.length === 0) {
          console.log("No snippets.");
          return;
        }
        for (const snippet of snippets) {
          const category = snippet.category.length > 0 ? `  [${snippet.category}]` : "";
          console.log(`${shortId(snippet.id)}  ${preview(snippet.title, 40)}${category}`);
        }
        return;
      }

      case "add": {
        const snippet = yield* engine.saveSnippet(
          makeSnippet({
            title: validatedArgs.title,
            content: validatedArgs.content,
            category: validatedArgs.category,
          })
        );
        console.log(`Saved snippet ${shortId(snippet.id)}: ${snippet.title}`);
        return;
      }

      case "show": {
        const id = yield* resolveRef(validatedArgs.ref, (state) => snippetIds(state.snippets));
        const snippet = (yield* engine.snippets).find((candidate) => candidate.id === id);
        if (snippet === undefined) {
          return yield* Effect.fail(new SnippetNotFoundError({ id: validatedArgs.ref }));
        }
        const placeholders = getPlaceholders(snippet.content);
        console.log(`Title:         ${snippet.title}`);
        if (snippet.category.length > 0) {
          console.log(`Category:      ${snippet.category}`);
        }
        console.log(`Placeholders:  ${placeholders.length > 0 ? placeholders.join(", ") : "(none)"}`);
        console.log("");
        console.log(snippet.content);
        return;
      }

      case "rm": {
        const id = yield* resolveRef(validatedArgs.ref, (state) => snippetIds(state.snippets));
        yield* engine.deleteSnippet(id);
        console.log(`Deleted snippet ${shortId(id)}`);
        return;
      }

      case "use": {
        const id = yield* resolveRef(validatedArgs.ref, (state) => snippetIds(state.snippets));
        const text = yield* engine.useSnippet(id, validatedArgs.values);
        if (booleanFlag(args, "copy")) {
          const autoPaste = yield* AutoPasteService;
          yield* autoPaste.setClipboardContent(makeTextItem(text));
        }
        console.log(text);
        return;
      }
    }
  });
