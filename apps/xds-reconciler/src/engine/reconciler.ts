import { SpanStatusCode } from '@opentelemetry/api'
import type { Counter, Histogram, Span } from '@opentelemetry/api'
import type { Logger } from '@logtape/logtape'
import { TelemetryBuilder } from '@switchyard/telemetry'
import type { ServiceTelemetry } from '@switchyard/telemetry'
import { CompletionBarrier } from '../completion/barrier.js'
import type { Completion } from '../completion/barrier.js'
import { CancelledError, PushRejectedError, PushTimeoutError } from '../errors.js'
import { ResourceSet } from '../resources/resource-set.js'
import type { PortCallback } from '../resources/resource-set.js'
import type { ResourceKind } from '../resources/types.js'
import type { PushChannel, ResultCallback, RevertFunc } from '../xds/push-channel.js'
import { planReconcile } from './plan.js'
import type { PlannedAdd, ReconcilePlan } from './plan.js'

export type ReconcileOperation = 'install' | 'update' | 'uninstall'

export type BatchPhase =
  | 'pending'
  | 'deletes-issued'
  | 'await-delete-barrier'
  | 'adds-issued'
  | 'await-cluster-barrier'
  | 'await-listener-barrier'
  | 'committed'
  | 'rolling-back'
  | 'rolled-back'

export interface XdsReconcilerOptions {
  channel: PushChannel
  /** Deadline for every batch, covering all of its barriers. */
  ackTimeoutMs: number
  telemetry?: ServiceTelemetry
}

/**
 * State owned by one batch: its phase, the undo log and the port callbacks
 * still in flight.
 */
class Batch {
  phase: BatchPhase = 'pending'
  readonly reverts: RevertFunc[] = []
  /** Listener adds acknowledged individually, awaiting commit. */
  readonly acknowledged: string[] = []
  /** Listener deletes acknowledged, whose release callback already ran. */
  readonly released = new Set<string>()
  readonly callbacks: Promise<void>[] = []

  constructor(
    readonly operation: ReconcileOperation,
    private readonly logger: Logger
  ) {}

  get terminal(): boolean {
    return this.phase === 'committed' || this.phase === 'rolled-back'
  }

  transition(phase: BatchPhase): void {
    this.logger.debug`${this.operation} batch ${this.phase} -> ${phase}`
    this.phase = phase
  }
}

/**
 * Pushes resource sets to the data plane with all-or-nothing semantics.
 *
 * Deletes go out first, then adds in dependency order. Listener changes are
 * awaited through acknowledgment barriers; any failure replays the batch's
 * undo log before the error is returned.
 */
export class XdsReconciler {
  private readonly channel: PushChannel
  private readonly ackTimeoutMs: number
  private readonly logger: Logger
  private readonly telemetry: ServiceTelemetry
  private readonly batches: Counter
  private readonly duration: Histogram

  constructor(options: XdsReconcilerOptions) {
    this.channel = options.channel
    this.ackTimeoutMs = options.ackTimeoutMs
    this.telemetry = options.telemetry ?? TelemetryBuilder.noop('xds-reconciler')
    this.logger = this.telemetry.logger.getChild('reconciler')

    this.batches = this.telemetry.meter.createCounter('switchyard.reconcile.batches', {
      description: 'Reconciliation batches by operation and outcome',
      unit: '{batch}',
    })
    this.duration = this.telemetry.meter.createHistogram('switchyard.reconcile.duration', {
      description: 'Duration of reconciliation batches, barriers included',
      unit: 's',
    })
  }

  install(set: ResourceSet, signal?: AbortSignal): Promise<void> {
    return this.reconcile('install', ResourceSet.empty(), set, signal)
  }

  update(previous: ResourceSet, next: ResourceSet, signal?: AbortSignal): Promise<void> {
    return this.reconcile('update', previous, next, signal)
  }

  uninstall(set: ResourceSet, signal?: AbortSignal): Promise<void> {
    return this.reconcile('uninstall', set, ResourceSet.empty(), signal)
  }

  private async reconcile(
    operation: ReconcileOperation,
    previous: ResourceSet,
    next: ResourceSet,
    external: AbortSignal | undefined
  ): Promise<void> {
    if (external?.aborted) {
      throw new CancelledError(`${operation} cancelled before start`)
    }

    const plan = planReconcile(previous, next)
    for (const name of plan.retainedListeners) {
      next.dropPortCallback(name)
    }

    const controller = new AbortController()
    const timer = setTimeout(
      () => controller.abort(new PushTimeoutError(this.ackTimeoutMs)),
      this.ackTimeoutMs
    )
    const onCancel = () => controller.abort(new CancelledError(`${operation} cancelled`))
    external?.addEventListener('abort', onCancel, { once: true })

    const batch = new Batch(operation, this.logger)
    const start = performance.now()

    return this.telemetry.tracer.startActiveSpan(`reconcile ${operation}`, async (span: Span) => {
      span.setAttributes({
        'reconcile.operation': operation,
        'reconcile.deletes': plan.deletes.length,
        'reconcile.adds': plan.adds.length,
        'reconcile.wait_for_delete': plan.waitForDelete,
      })
      let outcome: 'committed' | 'rolled_back' = 'committed'
      try {
        await this.execute(batch, plan, previous, controller.signal)
        this.logger.info`${operation} committed: ${plan.deletes.length} delete(s), ${plan.adds.length} add(s)`
        for (const name of batch.acknowledged) {
          this.runCallback(batch, 'commit', name, next.takePortCallback(name), controller.signal)
        }
      } catch (err) {
        outcome = 'rolled_back'
        span.recordException(err instanceof Error ? err : String(err))
        span.setStatus({ code: SpanStatusCode.ERROR })
        throw err
      } finally {
        clearTimeout(timer)
        external?.removeEventListener('abort', onCancel)
        await Promise.allSettled(batch.callbacks)
        const attributes = { operation, outcome }
        this.batches.add(1, attributes)
        this.duration.record((performance.now() - start) / 1000, attributes)
        span.end()
      }
    })
  }

  private async execute(
    batch: Batch,
    plan: ReconcilePlan,
    previous: ResourceSet,
    signal: AbortSignal
  ): Promise<void> {
    const listenerBarrier = new CompletionBarrier(signal, 'listener')
    const deleteBarrier = plan.waitForDelete ? new CompletionBarrier(signal, 'delete') : undefined
    const listenerAdds = plan.adds.filter((add) => add.kind === 'listener')
    const otherAdds = plan.adds.filter((add) => add.kind !== 'listener')
    const clusterBarrier =
      listenerAdds.length > 0 ? new CompletionBarrier(signal, 'cluster') : undefined

    try {
      for (const { kind, name } of plan.deletes) {
        let completion: Completion | undefined
        let onResult: ResultCallback | undefined
        if (kind === 'listener') {
          completion = (deleteBarrier ?? listenerBarrier).register()
          onResult = (err) => {
            if (err || batch.terminal) return
            batch.released.add(name)
            this.runCallback(batch, 'release', name, previous.takePortCallback(name), signal)
          }
        }
        this.issue(batch, kind, name, () => this.channel.delete(kind, name, completion, onResult))
      }
      batch.transition('deletes-issued')

      if (deleteBarrier) {
        batch.transition('await-delete-barrier')
        await deleteBarrier.wait()
      }

      for (const add of otherAdds) {
        const completion = add.kind === 'cluster' ? clusterBarrier?.register() : undefined
        this.push(batch, add, completion)
      }
      batch.transition('adds-issued')

      if (clusterBarrier) {
        batch.transition('await-cluster-barrier')
        await clusterBarrier.wait()
      }

      for (const add of listenerAdds) {
        this.push(batch, add, listenerBarrier.register(), (err) => {
          if (!err && !batch.terminal) batch.acknowledged.push(add.name)
        })
      }
      batch.transition('await-listener-barrier')
      await listenerBarrier.wait()

      batch.transition('committed')
    } catch (err) {
      this.rollback(batch, err)
      throw err
    }
  }

  private push(
    batch: Batch,
    add: PlannedAdd,
    completion?: Completion,
    onResult?: ResultCallback
  ): void {
    this.issue(batch, add.kind, add.name, () =>
      this.channel.upsert(add.kind, add.name, add.resource, completion, onResult)
    )
  }

  /** Record the undo of one channel call. A call that throws fails the batch. */
  private issue(batch: Batch, kind: ResourceKind, name: string, call: () => RevertFunc): void {
    let revert: RevertFunc
    try {
      revert = call()
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      throw new PushRejectedError(kind, name, detail, { cause: err })
    }
    batch.reverts.push(revert)
  }

  /**
   * Undo every issued call. Replay runs newest first so a listener deleted
   * and re-added under the same name ends up in its original state.
   */
  private rollback(batch: Batch, cause: unknown): void {
    batch.transition('rolling-back')
    const reason = cause instanceof Error ? cause.message : String(cause)
    this.logger.warn`${batch.operation} failed, rolling back ${batch.reverts.length} change(s): ${reason}`

    for (const revert of batch.reverts.splice(0).reverse()) {
      try {
        revert()
      } catch (err) {
        this.logger.error`Revert failed during ${batch.operation} rollback: ${err}`
      }
    }
    for (const name of batch.released) {
      this.logger.warn`Listener ${name} restored by rollback after its port was released`
    }
    batch.transition('rolled-back')
  }

  private runCallback(
    batch: Batch,
    action: 'commit' | 'release',
    listenerName: string,
    callback: PortCallback | undefined,
    signal: AbortSignal
  ): void {
    if (!callback) return
    batch.callbacks.push(
      Promise.resolve()
        .then(() => callback(signal))
        .catch((err: unknown) => {
          this.logger.warn`Port ${action} for listener ${listenerName} failed: ${err}`
        })
    )
  }
}
