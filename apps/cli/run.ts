#!/usr/bin/env node
/**
 * CLI runner
 *
 * Usage:
 *   tsx apps/cli/run.ts pipeline
 *   tsx apps/cli/run.ts stage:listing
 *   tsx apps/cli/run.ts stage:details
 *   tsx apps/cli/run.ts stage:export
 *   tsx apps/cli/run.ts task jerrybase:details
 *   tsx apps/cli/run.ts list
 */

import 'dotenv/config'
import { isStage, listTasks, runPipeline, runStage, runTask } from '../../packages/orchestrator/runner.js'

const command = process.argv[2]
const arg = process.argv[3]

function usage(): void {
  console.error('Usage: tsx apps/cli/run.ts <command> [args]')
  console.error('')
  console.error('Commands:')
  console.error('  pipeline         - Run listing, details and export in order')
  console.error('  stage:listing    - Crawl yearly listings into the events file')
  console.error('  stage:details    - Enrich events from their detail pages (resumable)')
  console.error('  stage:export     - Write the enriched events to a workbook')
  console.error('  task <id>        - Run specific task by ID')
  console.error('  list             - List all available tasks')
}

async function main(): Promise<void> {
  try {
    if (!command) {
      usage()
      process.exit(1)
    }

    // Pipeline command
    if (command === 'pipeline') {
      const result = await runPipeline()
      if (!result.success) process.exitCode = 1
    }

    // Stage commands
    else if (command.startsWith('stage:')) {
      const stage = command.slice('stage:'.length)
      if (!isStage(stage)) {
        console.error(`Unknown stage: ${stage}`)
        process.exit(1)
      }
      const result = await runStage(stage)
      if (result.failed > 0) process.exitCode = 1
    }

    // Task command
    else if (command === 'task') {
      if (!arg) {
        console.error('Error: task ID required')
        console.error('Usage: tsx apps/cli/run.ts task <task-id>')
        process.exit(1)
      }
      const result = await runTask(arg)
      console.log(JSON.stringify(result, null, 2))
    }

    // List command
    else if (command === 'list') {
      const tasks = await listTasks()

      console.log('\n📋 Available tasks:\n')

      tasks.forEach(task => {
        console.log(`  ${task.id}`)
        console.log(`    Stage: ${task.stage}`)
        console.log(`    ${task.description}`)
        console.log()
      })

      console.log(`Total: ${tasks.length} task(s)`)
    }

    // Unknown command
    else {
      console.error(`Unknown command: ${command}`)
      usage()
      process.exit(1)
    }

  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error))
    console.error(`\n❌ ${err.name}:`, err.message)
    console.error(err.stack)
    process.exit(1)
  }
}

void main()
