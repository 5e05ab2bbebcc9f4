/**
 * Puerto de notificaciones, usado para presentar al usuario el resumen de
 * la construcción.
 */
export interface NotificationPort {
  showInformation(message: string): void;
  showWarning(message: string): void;
  showError(message: string): void;
}
