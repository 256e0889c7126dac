import { performance } from 'node:perf_hooks'
import buildScenario from '../src/traffic/buildScenario.js'
import { logger } from '../src/config/logger.js'

const pairs = Array.from({ length: 10_000 }, (_, i) => buildScenario(Math.random, `pair${i}`))
let maxMs = 0
let degenerate = 0
let collisionCourses = 0
const start = performance.now()
for (const { ownship, target } of pairs) {
  const frameStart = performance.now()
  const cpa = ownship.cpa(target, { allowDegenerate: true })
  if (cpa.degenerate) degenerate++
  collisionCourses += ownship.coursesToCollide(target).length
  const elapsed = performance.now() - frameStart
  if (elapsed > maxMs) maxMs = elapsed
}
const total = performance.now() - start
logger.info(`avg pair ms ${(total / pairs.length).toFixed(4)}`)
logger.info(`max pair ms ${maxMs.toFixed(4)}`)
logger.info(`#pairs processed ${pairs.length}, degenerate ${degenerate}, collision courses ${collisionCourses}`)
