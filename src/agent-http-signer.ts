#!/usr/bin/env node
import { runAgentHttpSigner } from './cli.js'

await runAgentHttpSigner()
