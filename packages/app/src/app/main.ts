#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, pipe } from "effect"

import { program } from "./program.js"

// CHANGE: run the program through the Node platform runtime with its layer
// WHY: runMain installs signal handling, so an interrupted command still closes the pool and the Redis client
// QUOTE(TZ): "graceful shutdown"
// REF: contest-tally-cli
// SOURCE: https://effect.website/docs/platform/runtime/ "runMain helps you execute a main effect with built-in error handling, logging, and signal management."
// FORMAT THEOREM: forall argv: runMain(program(argv)) -> scope finalizers run before exit
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError | DatabaseError | RedisError, never>
// INVARIANT: program executed with NodeContext.layer
// COMPLEXITY: O(1)/O(1)
const main = pipe(program, Effect.provide(NodeContext.layer))

NodeRuntime.runMain(main)
