#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { chatCommand } from "./commands/chat/command.js"
import { loginCommand } from "./commands/login.js"

const root = Command.make("modalchat", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([chatCommand, loginCommand]),
)

const cli = Command.run(root, { name: "modalchat", version: "0.1.0" })

const defaultedToChat = process.argv.length <= 2
const argv = defaultedToChat ? [...process.argv.slice(0, 2), "chat"] : process.argv

cli(argv)
  .pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
