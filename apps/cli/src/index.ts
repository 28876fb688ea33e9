#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import {
  runAdd,
  runComplete,
  runList,
  runMove,
  runRemove,
  runToggle,
  runWithConfig,
  type CliContext,
  type ConfigArgs,
} from "./commands.js";

const sharedArgs = {
  config: {
    type: "string",
    description: "Path to config file (default: auto-detect urlbar.config.ts)",
  },
  noConfig: {
    type: "boolean",
    description: "Skip loading the config file",
  },
} as const;

async function withContext(
  args: ConfigArgs,
  run: (ctx: CliContext) => number,
): Promise<void> {
  process.exitCode = await runWithConfig(args, process.cwd(), run);
}

const complete = defineCommand({
  meta: {
    name: "complete",
    description: "Print the inline completion for partially typed text",
  },
  args: {
    ...sharedArgs,
    text: {
      type: "positional",
      description: "Text typed into the address bar",
      required: true,
    },
  },
  run: ({ args }) => withContext(args, (ctx) => runComplete(ctx, args.text)),
});

const list = defineCommand({
  meta: { name: "list", description: "List custom domains" },
  args: sharedArgs,
  run: ({ args }) => withContext(args, runList),
});

const add = defineCommand({
  meta: { name: "add", description: "Add a custom domain" },
  args: {
    ...sharedArgs,
    domain: {
      type: "positional",
      description: "Domain to add, e.g. example.com",
      required: true,
    },
    at: {
      type: "string",
      description: "Zero-based position to insert at (default: end)",
    },
  },
  run: ({ args }) =>
    withContext(args, (ctx) => runAdd(ctx, args.domain, args.at)),
});

const remove = defineCommand({
  meta: { name: "remove", description: "Remove a custom domain by position" },
  args: {
    ...sharedArgs,
    index: {
      type: "positional",
      description: "Zero-based position as shown by `domains list`",
      required: true,
    },
  },
  run: ({ args }) => withContext(args, (ctx) => runRemove(ctx, args.index)),
});

const move = defineCommand({
  meta: { name: "move", description: "Move a custom domain to a new position" },
  args: {
    ...sharedArgs,
    from: {
      type: "positional",
      description: "Current zero-based position",
      required: true,
    },
    to: {
      type: "positional",
      description: "New zero-based position",
      required: true,
    },
  },
  run: ({ args }) =>
    withContext(args, (ctx) => runMove(ctx, args.from, args.to)),
});

const domains = defineCommand({
  meta: { name: "domains", description: "Manage the custom domain list" },
  subCommands: { list, add, remove, move },
});

const toggle = defineCommand({
  meta: {
    name: "toggle",
    description: "Show or set the autocomplete toggles (domains, custom)",
  },
  args: {
    ...sharedArgs,
    name: {
      type: "positional",
      description: "Toggle to set: domains or custom",
      required: false,
    },
    state: {
      type: "positional",
      description: "on or off",
      required: false,
    },
  },
  run: ({ args }) =>
    withContext(args, (ctx) => runToggle(ctx, args.name, args.state)),
});

const main = defineCommand({
  meta: {
    name: "urlbar",
    version: "0.1.0",
    description: "Address bar domain autocomplete",
  },
  subCommands: { complete, domains, toggle },
});

runMain(main);
