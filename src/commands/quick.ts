/**
 * quick command - One-shot actions on a clipboard item
 *
 * Usage:
 *   clipvault quick save <id> <file-or-dir>   Write the item's content to disk
 *   clipvault quick base64 <id>               Base64-encode onto the clipboard
 *   clipvault quick url-encode <id>           Percent-encode onto the clipboard
 *   clipvault quick url-decode <id>           Percent-decode onto the clipboard
 *   clipvault quick edit <id> <text>          Capture an edited copy
 */

import { Effect } from "effect";
import { QuickCommandArgsSchema } from "../models";
import { QuickActionsService } from "../services/quick-actions-service";
import type { ParsedArgs } from "../cli/parser";
import { decodeArgs, resolveRef, shortId } from "./shared";

const USAGE = "clipvault quick <save|base64|url-encode|url-decode|edit> <id> [target|text]";

const parseQuickArgs = (args: ParsedArgs) => {
  const [action, ref, ...rest] = args.positional;
  switch (action) {
    case "save":
      return { action, ref, target: rest[0] };
    case "edit":
      return { action, ref, text: rest.join(" ") };
    default:
      return { action, ref };
  }
};

export const quickCommand = (args: ParsedArgs) =>
  Effect.gen(function* () {
    const quickActions = yield* QuickActionsService;
    const validatedArgs = yield* decodeArgs(QuickCommandArgsSchema, parseQuickArgs(args), USAGE);
    const id = yield* resolveRef(validatedArgs.ref);

    switch (validatedArgs.action) {
      case "save": {
        const path = yield* quickActions.saveToFile(id, validatedArgs.target);
        console.log(`Saved to ${path}`);
        return;
      }
      case "edit": {
        const edited = yield* quickActions.editText(id, validatedArgs.text);
        console.log(`Captured edited copy as ${shortId(edited.id)}`);
        return;
      }
      case "base64":
        console.log(yield* quickActions.copyAsBase64(id));
        return;
      case "url-encode":
        console.log(yield* quickActions.urlEncode(id));
        return;
      case "url-decode":
        console.log(yield* quickActions.urlDecode(id));
        return;
    }
  });
