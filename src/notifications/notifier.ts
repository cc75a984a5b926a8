import { EVENING_REMINDERS, MORNING_REMINDERS, STREAK_TEMPLATES } from '@/constants';
import { logger as defaultLogger, type Logger } from '@/utils/logger';

/** Receives streak milestones; delivery is fire-and-forget */
export interface StreakNotifier {
  scheduleStreakNotification(streak: number): void;
}

export type ReminderSlot = 'morning' | 'evening';

export interface NotificationMessage {
  title: string;
  body: string;
}

function pick(messages: readonly string[], random: () => number): string {
  const index = Math.min(Math.floor(random() * messages.length), messages.length - 1);
  return messages[index];
}

/** Fill a streak template with the streak length. */
export function streakMessage(streak: number, random: () => number = Math.random): NotificationMessage {
  return {
    title: 'Streak Update',
    body: pick(STREAK_TEMPLATES, random).replace('{n}', String(streak)),
  };
}

/**
 * Notifier that writes messages to the log. A device shell would swap
 * this for its local notification scheduler.
 */
export class LogNotifier implements StreakNotifier {
  readonly sent: NotificationMessage[] = [];
  private readonly log: Logger;

  constructor(
    private readonly random: () => number = Math.random,
    log?: Logger
  ) {
    this.log = log ?? defaultLogger.child('notifier');
  }

  scheduleStreakNotification(streak: number): void {
    this.deliver(streakMessage(streak, this.random));
  }

  dailyReminder(slot: ReminderSlot): NotificationMessage {
    const message = {
      title: 'Daily Reminder',
      body: pick(slot === 'morning' ? MORNING_REMINDERS : EVENING_REMINDERS, this.random),
    };
    this.deliver(message);
    return message;
  }

  private deliver(message: NotificationMessage): void {
    this.sent.push(message);
    this.log.info(message.title, { body: message.body });
  }
}
