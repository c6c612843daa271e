export {
  TaskNotifier,
  DEFAULT_TEMPLATES,
  logSink,
  renderTemplate,
  type NotificationSink,
  type NotificationTemplate,
  type TaskNotification,
} from './task-notifier.js';
