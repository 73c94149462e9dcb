export { NotificationWriter, NewNotification } from './notification-writer.service';
