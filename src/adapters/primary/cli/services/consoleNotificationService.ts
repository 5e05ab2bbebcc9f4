import { NotificationPort } from "../../../../application/ports/driven/NotificationPort";

/**
 * Servicio para presentar notificaciones en la terminal
 */
export class ConsoleNotificationService implements NotificationPort {
  showInformation(message: string): void {
    console.log(message);
  }

  showWarning(message: string): void {
    console.warn(`⚠️  ${message}`);
  }

  showError(message: string): void {
    console.error(`❌ ${message}`);
  }
}
