import { NotificationState } from '../../../domain/entities/NotificationState';
import { SlotState } from '../../../domain/entities/SlotState';
import type { StateFile, UserSlotStateFile } from '../../../../../shared/validation/schemas';

/**
 * Converts the validated state document to the domain NotificationState
 */
export function stateToDomain(file: StateFile): NotificationState {
  return new NotificationState(
    Object.entries(file.users).map(([userName, record]): [string, SlotState] => [
      userName,
      slotStateToDomain(record),
    ])
  );
}

export function slotStateToDomain(record: UserSlotStateFile): SlotState {
  return new SlotState({
    slotsDate: record.slots_date,
    slotsSent: record.slots_sent,
    assetsSentToday: record.assets_sent_today,
    lastSlotTime: record.last_slot_time,
  });
}

/**
 * Converts the domain NotificationState to the snake_case document written to disk
 */
export function stateToFile(state: NotificationState): StateFile {
  const users: Record<string, UserSlotStateFile> = {};
  for (const [userName, slotState] of state.entries()) {
    users[userName] = {
      slots_date: slotState.slotsDate,
      slots_sent: [...slotState.slotsSent],
      assets_sent_today: [...slotState.assetsSentToday],
      last_slot_time: slotState.lastSlotTime,
    };
  }
  return { users };
}
