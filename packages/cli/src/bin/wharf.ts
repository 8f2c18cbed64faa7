#!/usr/bin/env node
/**
 * bin/wharf.ts — Entry point for the `wharf` command.
 *
 * wharf keys               generate the account and module keys
 * wharf deploy --build     build, sign, plan and apply (asks first)
 * wharf outputs            print the invocation URL
 */

import { createProgram } from '../commands/index.js'

await createProgram().parseAsync()
