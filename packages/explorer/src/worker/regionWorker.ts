/**
 * Region Worker Entry
 *
 * Loaded by the thread pool with `new Worker(...)`. Serves the region task
 * registry until the pool terminates the thread.
 */

import { startWorkerHost } from '@fractalflow/system'
import { regionTasks } from '../render/regionTasks'

startWorkerHost({ tasks: regionTasks })
