/**
 * Crucible State Machine
 * @module services/crucible/crucibleMachine
 *
 * One crucible per (user, game, draw). It is filled from the ingot
 * collection while `draft` and before the cutoff, then locked with an
 * explicit confirmation step:
 *
 * ```
 *   draft ──lock()──▶ submitted ──remote ok──▶ (stays submitted)
 *     ▲                   │
 *     └───remote failed───┘
 * ```
 *
 * `locked` is accepted from storage and treated as terminal.
 *
 * Guard violations come back as `{ ok: false, reason }` and leave no trace.
 * Store and remote errors are thrown after every completed step has been
 * compensated.
 */

import type { PlaycardSubmission } from "../../lib/api/apiClient.js";
import type { PlaycardResponse } from "../../lib/api/schemas.js";
import {
  LocalPersistenceError,
  SubmissionRejectedError,
} from "../../lib/errors.js";
import { captureError } from "../../lib/sentry.js";
import type {
  CollectionScope,
  Crucible,
  CrucibleStatus,
  Ingot,
} from "../../types/models.js";
import type { IngotCollectionStore } from "../collectionStore.js";
import { EventTypes, type EventBus } from "../eventBus.js";
import type { CrucibleRepository } from "./crucibleRepository.js";

export const VALID_TRANSITIONS: Record<CrucibleStatus, CrucibleStatus[]> = {
  draft: ["submitted", "locked"],
  submitted: ["draft"], // failed remote lock only
  locked: [],
};

export type RejectionReason =
  | "not_draft"
  | "past_cutoff"
  | "cutoff_unknown"
  | "full"
  | "incomplete"
  | "slot_not_found"
  | "not_in_collection"
  | "stale_confirmation";

export interface Rejection {
  ok: false;
  reason: RejectionReason;
  message: string;
}

export type MutationOutcome = { ok: true; crucible: Crucible } | Rejection;

export interface LockConfirmation {
  scope: CollectionScope;
  ingotIds: number[];
}

export type LockRequestOutcome =
  | { ok: true; confirmation: LockConfirmation }
  | Rejection;

export class CrucibleStateError extends Error {
  constructor(
    public readonly from: CrucibleStatus,
    public readonly to: CrucibleStatus,
  ) {
    super(`Invalid crucible transition: ${from} -> ${to}`);
    this.name = "CrucibleStateError";
  }
}

/**
 * The remote lock failed and the `draft` status could not be saved back.
 * The store still says `submitted`; calling lock() again from this machine
 * saves the status afresh before retrying.
 */
export class CrucibleRevertError extends Error {
  constructor(
    public readonly lockError: unknown,
    revertError: unknown,
  ) {
    super(
      `Crucible lock failed (${errorMessage(lockError)}) and the draft status could not be saved: ${errorMessage(revertError)}`,
      { cause: revertError },
    );
    this.name = "CrucibleRevertError";
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface PlaycardSubmitter {
  submitPlaycard(submission: PlaycardSubmission): Promise<PlaycardResponse>;
}

export interface CrucibleMachineDeps {
  repository: CrucibleRepository;
  collection: IngotCollectionStore;
  api: PlaycardSubmitter;
  // Game's regular-balls-drawn count
  requiredCount: number;
  // Null when the draw instant could not be derived
  cutoffAt: Date | null;
  lockSuccessStatuses: readonly string[];
  now?: () => Date;
  bus?: EventBus;
}

function reject(reason: RejectionReason, message: string): Rejection {
  console.log(`ℹ️ Crucible change rejected (${reason}): ${message}`);
  return { ok: false, reason, message };
}

export class CrucibleMachine {
  private readonly now: () => Date;

  private constructor(
    private readonly deps: CrucibleMachineDeps,
    private crucible: Crucible,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Load the stored crucible for the scope or start an unsaved draft
   */
  static async load(
    deps: CrucibleMachineDeps,
    scope: CollectionScope,
  ): Promise<CrucibleMachine> {
    const stored = await deps.repository.find(scope);
    const crucible: Crucible = stored ?? {
      id: null,
      name: `${scope.gameName} ${scope.drawDate}`,
      userId: scope.userId,
      gameName: scope.gameName,
      drawDate: scope.drawDate,
      status: "draft",
      combinations: [],
      submittedAt: (deps.now?.() ?? new Date()).toISOString(),
    };
    return new CrucibleMachine(deps, crucible);
  }

  get state(): Crucible {
    return { ...this.crucible, combinations: [...this.crucible.combinations] };
  }

  get scope(): CollectionScope {
    return {
      userId: this.crucible.userId,
      gameName: this.crucible.gameName,
      drawDate: this.crucible.drawDate,
    };
  }

  isEditable(): boolean {
    return this.guard() === null;
  }

  /**
   * Only the id is taken from `ingot`; the numbers come from the collection
   */
  async addItem(ingot: Pick<Ingot, "ingotId">): Promise<MutationOutcome> {
    const blocked = this.guard();
    if (blocked) return blocked;

    if (this.crucible.combinations.length >= this.deps.requiredCount) {
      return reject(
        "full",
        `Crucible already holds ${this.deps.requiredCount} ingots`,
      );
    }
    const collected = await this.deps.collection.get(ingot.ingotId);
    if (!collected) {
      return reject("not_in_collection", `Ingot ${ingot.ingotId} is not collected`);
    }

    const item: Ingot = { ingotId: collected.ingotId, numbers: collected.numbers };
    const previous = this.crucible.combinations;
    await this.deps.collection.remove(item.ingotId);
    this.crucible = { ...this.crucible, combinations: [...previous, item] };

    try {
      await this.persist();
    } catch (error) {
      this.crucible = { ...this.crucible, combinations: previous };
      await this.compensate("re-add ingot to collection", () =>
        this.deps.collection.add(item),
      );
      throw error;
    }

    this.publishUpdate();
    return { ok: true, crucible: this.state };
  }

  /**
   * Put `incoming` from the collection into the slot held by
   * `outgoingIngotId`; the displaced ingot goes back to the collection
   */
  async replaceItem(
    incomingRef: Pick<Ingot, "ingotId">,
    outgoingIngotId: number,
  ): Promise<MutationOutcome> {
    const blocked = this.guard();
    if (blocked) return blocked;

    const previous = this.crucible.combinations;
    const index = previous.findIndex((item) => item.ingotId === outgoingIngotId);
    if (index === -1) {
      return reject(
        "slot_not_found",
        `Ingot ${outgoingIngotId} is not in the crucible`,
      );
    }
    const collected = await this.deps.collection.get(incomingRef.ingotId);
    if (!collected) {
      return reject(
        "not_in_collection",
        `Ingot ${incomingRef.ingotId} is not collected`,
      );
    }

    const incoming: Ingot = {
      ingotId: collected.ingotId,
      numbers: collected.numbers,
    };

    const displaced = previous[index];
    const swapped = [...previous];
    swapped[index] = incoming;
    this.crucible = { ...this.crucible, combinations: swapped };

    let removedIncoming = false;
    let returnedDisplaced = false;
    try {
      await this.deps.collection.remove(incoming.ingotId);
      removedIncoming = true;
      await this.deps.collection.add(displaced);
      returnedDisplaced = true;
      await this.persist();
    } catch (error) {
      this.crucible = { ...this.crucible, combinations: previous };
      if (returnedDisplaced) {
        await this.compensate("take displaced ingot back", () =>
          this.deps.collection.remove(displaced.ingotId),
        );
      }
      if (removedIncoming) {
        await this.compensate("return incoming ingot", () =>
          this.deps.collection.add(incoming),
        );
      }
      throw error;
    }

    this.publishUpdate();
    return { ok: true, crucible: this.state };
  }

  /**
   * First half of locking: checks the crucible can be locked and names
   * exactly what will be submitted
   */
  requestLock(): LockRequestOutcome {
    const blocked = this.guard();
    if (blocked) return blocked;

    const count = this.crucible.combinations.length;
    if (count !== this.deps.requiredCount) {
      return reject(
        "incomplete",
        `Crucible holds ${count} of ${this.deps.requiredCount} ingots`,
      );
    }

    return {
      ok: true,
      confirmation: {
        scope: this.scope,
        ingotIds: this.crucible.combinations.map((item) => item.ingotId),
      },
    };
  }

  /**
   * Submit the crucible. The `submitted` status is saved before the remote
   * call; any remote failure reverts it to `draft` and is rethrown, or
   * surfaces as a CrucibleRevertError when that revert cannot be saved.
   */
  async lock(confirmation: LockConfirmation): Promise<MutationOutcome> {
    const check = this.requestLock();
    if (!check.ok) return check;
    if (!sameConfirmation(check.confirmation, confirmation)) {
      return reject(
        "stale_confirmation",
        "Crucible changed since the lock was confirmed",
      );
    }

    this.transition("submitted");
    try {
      await this.persist();
    } catch (error) {
      this.transition("draft");
      throw error;
    }

    const ingotIds = confirmation.ingotIds;
    try {
      const response = await this.deps.api.submitPlaycard({
        userId: this.crucible.userId,
        gameName: this.crucible.gameName,
        drawDate: this.crucible.drawDate,
        playCardId: this.crucible.id ?? 0,
        ingotIds,
      });
      if (!this.deps.lockSuccessStatuses.includes(response.status)) {
        throw new SubmissionRejectedError(
          response.status,
          response.message ?? "Server indicated submission failed.",
        );
      }
    } catch (error) {
      console.warn(
        `⚠️ Lock failed for crucible ${this.crucible.id}, reverting to draft:`,
        error,
      );
      this.transition("draft");
      let revertError: unknown = null;
      try {
        await this.persist();
      } catch (saveError) {
        revertError = saveError;
      }
      this.deps.bus?.publish(
        EventTypes.CRUCIBLE_LOCK_FAILED,
        { ...this.scope, error: errorMessage(error) },
        "crucible",
      );
      if (revertError !== null) {
        const wrapped = new CrucibleRevertError(error, revertError);
        console.error(`❌ ${wrapped.message}`);
        captureError(wrapped, { tags: { component: "crucible" }, extra: { ...this.scope } });
        throw wrapped;
      }
      throw error;
    }

    try {
      await this.deps.collection.clearAll();
    } catch (error) {
      const wrapped = new LocalPersistenceError("Crucible lock", error);
      captureError(wrapped, { tags: { component: "crucible" }, extra: { ...this.scope } });
      throw wrapped;
    }
    console.log(
      `🔒 Crucible ${this.crucible.id} submitted for ${this.crucible.gameName} ${this.crucible.drawDate}`,
    );
    this.deps.bus?.publish(
      EventTypes.CRUCIBLE_LOCKED,
      { ...this.scope, ingotIds },
      "crucible",
    );
    return { ok: true, crucible: this.state };
  }

  private guard(): Rejection | null {
    if (this.crucible.status !== "draft") {
      return reject("not_draft", `Crucible is ${this.crucible.status}`);
    }
    if (this.deps.cutoffAt === null) {
      return reject("cutoff_unknown", "Cutoff time for this draw is unknown");
    }
    if (this.now().getTime() >= this.deps.cutoffAt.getTime()) {
      return reject("past_cutoff", "Submissions for this draw are closed");
    }
    return null;
  }

  private transition(to: CrucibleStatus): void {
    const from = this.crucible.status;
    if (!VALID_TRANSITIONS[from].includes(to)) {
      throw new CrucibleStateError(from, to);
    }
    this.crucible = { ...this.crucible, status: to };
  }

  private async persist(): Promise<void> {
    const saved = await this.deps.repository.save(this.crucible);
    this.crucible = { ...this.crucible, id: saved.id, submittedAt: saved.submittedAt };
  }

  private async compensate(
    step: string,
    action: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await action();
    } catch (error) {
      console.error(`❌ Crucible compensation failed (${step}):`, error);
      captureError(error, {
        tags: { component: "crucible", step },
        extra: { ...this.scope },
      });
    }
  }

  private publishUpdate(): void {
    this.deps.bus?.publish(
      EventTypes.CRUCIBLE_UPDATED,
      { ...this.scope, count: this.crucible.combinations.length },
      "crucible",
    );
  }
}

function sameConfirmation(a: LockConfirmation, b: LockConfirmation): boolean {
  return (
    a.scope.userId === b.scope.userId &&
    a.scope.gameName === b.scope.gameName &&
    a.scope.drawDate === b.scope.drawDate &&
    a.ingotIds.length === b.ingotIds.length &&
    a.ingotIds.every((id, i) => id === b.ingotIds[i])
  );
}
