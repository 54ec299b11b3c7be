import { HttpStatus } from "@nestjs/common";
import { DomainError } from "../common/domain-error";

export type MedicationErrorCode =
  | "SAVE_FAILED"
  | "LOAD_FAILED"
  | "UPDATE_FAILED"
  | "DELETE_FAILED"
  | "NOTIFICATION_PERMISSION_DENIED"
  | "INVALID_DATA";

export class MedicationError extends DomainError<MedicationErrorCode> {
  get status(): HttpStatus {
    switch (this.code) {
      case "NOTIFICATION_PERMISSION_DENIED":
        return HttpStatus.CONFLICT;
      case "INVALID_DATA":
        return HttpStatus.BAD_REQUEST;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }

  static saveFailed(detail: string) {
    return new MedicationError("SAVE_FAILED", `Failed to save medication: ${detail}`);
  }

  static loadFailed(detail: string) {
    return new MedicationError("LOAD_FAILED", `Failed to load medications: ${detail}`);
  }

  static updateFailed(detail: string) {
    return new MedicationError("UPDATE_FAILED", `Failed to update medication: ${detail}`);
  }

  static deleteFailed(detail: string) {
    return new MedicationError("DELETE_FAILED", `Failed to delete medication: ${detail}`);
  }

  static notificationPermissionDenied() {
    return new MedicationError(
      "NOTIFICATION_PERMISSION_DENIED",
      "Notification permission is required for medication reminders",
    );
  }

  static invalidData() {
    return new MedicationError("INVALID_DATA", "Invalid medication data provided");
  }
}
