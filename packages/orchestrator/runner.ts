/**
 * Task Orchestrator
 *
 * Generic runner that discovers and executes tasks from all event sources
 * by pipeline stage. Source-agnostic.
 */

import { glob } from 'glob'
import path from 'path'
import { fileURLToPath } from 'url'
import { errorMessage } from '../core/errors.js'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

/** Pipeline stages, in execution order */
export const STAGES = ['listing', 'details', 'export'] as const

export type Stage = typeof STAGES[number]

export interface Task {
  id: string;
  stage: Stage;
  description?: string;
  enabled?: boolean | (() => boolean);
  run: () => Promise<Record<string, unknown>>;
}

export interface TaskResult {
  taskId: string;
  success: boolean;
  duration: number;
  result?: Record<string, unknown>;
  error?: string;
  skipped?: boolean;
  reason?: string;
}

export interface StageResult {
  stage: Stage;
  tasksRun: number;
  failed: number;
  duration: number;
  tasks: TaskResult[];
}

export interface PipelineResult {
  stages: StageResult[];
  success: boolean;
  duration: number;
}

export interface TaskMetadata {
  id: string;
  stage: Stage;
  description: string;
}

function isTask(value: unknown): value is Task {
  if (typeof value !== 'object' || value === null) return false
  return 'id' in value && typeof value.id === 'string' &&
    'run' in value && typeof value.run === 'function' &&
    'stage' in value && typeof value.stage === 'string' && isStage(value.stage)
}

export function isStage(value: string): value is Stage {
  return STAGES.some(stage => stage === value)
}

function isEnabled(task: Task): boolean {
  if (task.enabled === undefined) return true
  return typeof task.enabled === 'function' ? task.enabled() : task.enabled
}

/**
 * Load all task definitions from all sources
 * @returns Array of all tasks
 */
async function loadAllTasks(): Promise<Task[]> {
  const tasks: Task[] = []

  // Find all tasks.ts files in sources
  const sourcesDir = path.join(__dirname, '../sources')
  const taskFiles = (await glob('*/tasks.{ts,js}', { cwd: sourcesDir, absolute: true })).sort()

  for (const taskFile of taskFiles) {
    try {
      const module: { default?: unknown } = await import(taskFile)
      const sourceTasks = Array.isArray(module.default) ? module.default.filter(isTask) : []

      tasks.push(...sourceTasks)
    } catch (error) {
      console.error(`Failed to load tasks from ${taskFile}:`, errorMessage(error))
    }
  }

  return tasks
}

/**
 * Execute a single task
 * @private
 */
async function executeTask(task: Task): Promise<TaskResult> {
  const startTime = Date.now()
  const result = await task.run()

  return {
    taskId: task.id,
    success: true,
    result,
    duration: Date.now() - startTime
  }
}

/**
 * Run all tasks of a stage
 * @param stage - Stage name ('listing', 'details', 'export')
 * @returns Execution summary
 */
export async function runStage(stage: Stage, tasks?: Task[]): Promise<StageResult> {
  console.log(`\n🚀 Running stage: ${stage}\n`)

  const startTime = Date.now()
  const allTasks = tasks ?? await loadAllTasks()

  const matchingTasks = allTasks.filter(task => {
    if (task.stage !== stage) return false

    if (!isEnabled(task)) {
      console.log(`⏭️  Skipping disabled task: ${task.id}`)
      return false
    }

    return true
  })

  if (matchingTasks.length === 0) {
    console.log(`⚠️  No tasks found for stage: ${stage}`)
    return { stage, tasksRun: 0, failed: 0, duration: Date.now() - startTime, tasks: [] }
  }

  console.log(`Found ${matchingTasks.length} task(s) to run:\n`)
  matchingTasks.forEach(task => {
    console.log(`  - ${task.id}: ${task.description || 'No description'}`)
  })
  console.log()

  const taskResults: TaskResult[] = []

  for (const task of matchingTasks) {
    try {
      taskResults.push(await executeTask(task))
    } catch (error) {
      console.error(`\n❌ Task ${task.id} failed:`, errorMessage(error))
      taskResults.push({
        taskId: task.id,
        success: false,
        error: errorMessage(error),
        duration: 0
      })
    }
  }

  const duration = Date.now() - startTime
  const failed = taskResults.filter(result => !result.success).length

  console.log(`\n✨ Stage ${stage} complete in ${(duration / 1000).toFixed(1)}s`)
  console.log(`   Tasks run: ${matchingTasks.length}`)
  console.log(`   Failed: ${failed}`)

  return {
    stage,
    tasksRun: matchingTasks.length,
    failed,
    duration,
    tasks: taskResults
  }
}

/**
 * Run every stage in order, stopping after the first stage with a failed task
 */
export async function runPipeline(tasks?: Task[]): Promise<PipelineResult> {
  const startTime = Date.now()
  const allTasks = tasks ?? await loadAllTasks()
  const stages: StageResult[] = []

  for (const stage of STAGES) {
    const result = await runStage(stage, allTasks)
    stages.push(result)

    if (result.failed > 0) {
      console.error(`\n❌ Pipeline stopped: stage ${stage} had ${result.failed} failed task(s)`)
      return { stages, success: false, duration: Date.now() - startTime }
    }
  }

  return { stages, success: true, duration: Date.now() - startTime }
}

/**
 * Run a specific task by ID
 * @param taskId - Task identifier (e.g., 'jerrybase:details')
 * @returns Task result
 */
export async function runTask(taskId: string, tasks?: Task[]): Promise<TaskResult> {
  console.log(`\n🎯 Running task: ${taskId}\n`)

  const allTasks = tasks ?? await loadAllTasks()
  const task = allTasks.find(t => t.id === taskId)

  if (!task) {
    throw new Error(`Task not found: ${taskId}`)
  }

  if (!isEnabled(task)) {
    console.log(`⏭️  Task is disabled: ${task.id}`)
    return {
      taskId: task.id,
      success: false,
      skipped: true,
      reason: 'Task is disabled via config',
      duration: 0
    }
  }

  return await executeTask(task)
}

/**
 * List all available tasks
 * @returns Array of task metadata
 */
export async function listTasks(): Promise<TaskMetadata[]> {
  const allTasks = await loadAllTasks()

  return allTasks.map(task => ({
    id: task.id,
    stage: task.stage,
    description: task.description || 'No description'
  }))
}
