import type { Logger } from "@shipwright/logger"
import type { PipelineHooks } from "./pipeline"

/**
 * Hooks that log `[Phase n/m]` when a new phase starts, one line per step,
 * and the failing step's stderr
 */
export function progressHooks(logger: Logger, phases: readonly string[] = []): PipelineHooks {
  let currentPhase: string | undefined

  return {
    onStepStart: (step, index, total) => {
      const phaseIndex = step.phase ? phases.indexOf(step.phase) : -1
      if (step.phase && step.phase !== currentPhase && phaseIndex >= 0) {
        currentPhase = step.phase
        logger.info(`[Phase ${phaseIndex + 1}/${phases.length}] ${step.phase}...`, { phase: step.phase })
      }
      logger.info(`[Step ${index + 1}/${total}] ${step.description}...`, { step: step.name, host: step.host })
    },
    onStepEnd: (step, outcome) => {
      if (outcome.ok) {
        logger.debug(`✓ ${step.name} (${outcome.record.durationMs}ms)`, { step: step.name })
        return
      }
      logger.error(`✗ ${step.description} failed`, outcome.failure.message, {
        step: step.name,
        host: step.host,
        kind: outcome.failure.kind,
      })
    },
  }
}

/**
 * Call every hook set in order
 */
export function combineHooks(...hooks: PipelineHooks[]): PipelineHooks {
  return {
    onStepStart: (step, index, total) => {
      for (const h of hooks) h.onStepStart?.(step, index, total)
    },
    onStepEnd: (step, outcome) => {
      for (const h of hooks) h.onStepEnd?.(step, outcome)
    },
  }
}
