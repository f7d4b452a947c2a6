import type { I18nKey } from "./i18n";

export type ReminderTierId = "3d" | "1d" | "3h";

export type ReminderTier = {
  id: ReminderTierId;
  offsetMs: number;
  labelKey: I18nKey;
};

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const REMINDER_TIERS: readonly ReminderTier[] = [
  { id: "3d", offsetMs: 3 * DAY_MS, labelKey: "reminderIn3Days" },
  { id: "1d", offsetMs: DAY_MS, labelKey: "reminderIn1Day" },
  { id: "3h", offsetMs: 3 * HOUR_MS, labelKey: "reminderIn3Hours" },
];

export type ReminderState = {
  enabled: boolean;
  fired: Record<ReminderTierId, boolean>;
};

function freshState(): ReminderState {
  return { enabled: true, fired: { "3d": false, "1d": false, "3h": false } };
}

/**
 * Per-giveaway reminder flags. Process-local: rebuilt with every tier unfired
 * after a restart.
 */
export class ReminderRegistry {
  private readonly states = new Map<number, ReminderState>();

  ensure(giveawayId: number): ReminderState {
    const existing = this.states.get(giveawayId);
    if (existing) {
      return existing;
    }
    const created = freshState();
    this.states.set(giveawayId, created);
    return created;
  }

  get(giveawayId: number): ReminderState | undefined {
    return this.states.get(giveawayId);
  }

  snapshot(giveawayId: number): ReminderState | undefined {
    const state = this.states.get(giveawayId);
    return state ? { enabled: state.enabled, fired: { ...state.fired } } : undefined;
  }

  setEnabled(giveawayId: number, enabled: boolean): void {
    this.ensure(giveawayId).enabled = enabled;
  }

  markFired(giveawayId: number, tier: ReminderTierId): void {
    const state = this.states.get(giveawayId);
    if (state) {
      state.fired[tier] = true;
    }
  }

  delete(giveawayId: number): boolean {
    return this.states.delete(giveawayId);
  }
}
