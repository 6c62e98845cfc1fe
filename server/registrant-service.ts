import type { WebinarRegistrant } from "../drizzle/schema";
import { errorMeta, type Logger } from "./_core/logger";
import type { RegistrantRepository } from "./db";
import { failureFrom, NotFoundError, type StorageErrorKind } from "./storage-errors";
import type { PhotoStore } from "./storage-interface";

export interface ActionResult {
  success: boolean;
  message: string;
  /** Set on failure so callers can branch without reading the message. */
  errorKind?: StorageErrorKind;
}

export interface PhotoUploadResult extends ActionResult {
  photoUrl: string | null;
}

export interface RegistrantView {
  id: string;
  name: string;
  email: string;
  company: string | null;
  webinarTitle: string;
  webinarDate: string;
  status: WebinarRegistrant["status"];
  photoUrl: string | null;
  notes: string | null;
  registrationDate: string;
}

export interface AttendeeView extends Omit<RegistrantView, "registrationDate"> {
  group: string | null;
  createdAt: string;
}

const storeLabels: Record<PhotoStore["kind"], string> = {
  local: "local storage",
  remote: "object storage",
};

function toRegistrantView(r: WebinarRegistrant): RegistrantView {
  return {
    id: r.id,
    name: r.name,
    email: r.email,
    company: r.company,
    webinarTitle: r.webinarTitle,
    webinarDate: r.webinarDate.toISOString(),
    status: r.status,
    photoUrl: r.photoUrl,
    notes: r.notes,
    registrationDate: r.registrationDate.toISOString(),
  };
}

function toAttendeeView(r: WebinarRegistrant): AttendeeView {
  const { registrationDate: _registrationDate, ...rest } = toRegistrantView(r);
  return { ...rest, group: r.group, createdAt: r.createdAt.toISOString() };
}

/**
 * Registrant photo and notes workflow. Every method answers with a
 * success flag and a user-facing message; nothing is thrown to the caller.
 */
export class RegistrantService {
  constructor(
    private readonly store: PhotoStore,
    private readonly registrants: RegistrantRepository,
    private readonly log: Logger
  ) {}

  async listRegistrants(): Promise<RegistrantView[]> {
    const rows = await this.registrants.listRegistrants();
    return rows.map(toRegistrantView);
  }

  /** Registrants as shown on the public attendee page. */
  async listAttendees(): Promise<AttendeeView[]> {
    const rows = await this.registrants.listRegistrants();
    return rows.map(toAttendeeView);
  }

  private fail(action: string, registrantId: string, error: unknown): ActionResult {
    if (!(error instanceof NotFoundError)) {
      this.log.error(action, { registrantId, ...errorMeta(error) });
    }
    return failureFrom(error, action);
  }

  private async requireRegistrant(registrantId: string): Promise<WebinarRegistrant> {
    const registrant = await this.registrants.getRegistrant(registrantId);
    if (!registrant) {
      throw new NotFoundError("Registrant not found");
    }
    return registrant;
  }

  /**
   * Store a photo and point the registrant at it. A previous photo is left
   * where it is; only the reference moves.
   */
  async uploadPhoto(
    registrantId: string,
    data: Buffer | Uint8Array,
    filename: string
  ): Promise<PhotoUploadResult> {
    try {
      await this.requireRegistrant(registrantId);
      const photoUrl = await this.store.put(data, filename);
      await this.registrants.setPhotoUrl(registrantId, photoUrl);

      this.log.info("Registrant photo uploaded", { registrantId, store: this.store.kind, photoUrl });
      return {
        success: true,
        message: `Photo uploaded successfully to ${storeLabels[this.store.kind]}!`,
        photoUrl,
      };
    } catch (error) {
      return { ...this.fail("Failed to upload photo", registrantId, error), photoUrl: null };
    }
  }

  async deletePhoto(registrantId: string): Promise<ActionResult> {
    try {
      const registrant = await this.requireRegistrant(registrantId);
      if (!registrant.photoUrl) {
        return { success: false, message: "No photo found for this registrant", errorKind: "not_found" };
      }

      try {
        await this.store.delete(registrant.photoUrl);
      } catch (error) {
        // Clear the reference even when the file could not be removed.
        this.log.warn("Failed to remove photo file", {
          registrantId,
          photoUrl: registrant.photoUrl,
          ...errorMeta(error),
        });
      }

      await this.registrants.setPhotoUrl(registrantId, null);
      return { success: true, message: "Photo deleted successfully!" };
    } catch (error) {
      return this.fail("Error deleting photo", registrantId, error);
    }
  }

  async updateNotes(registrantId: string, notes: string): Promise<ActionResult> {
    try {
      await this.requireRegistrant(registrantId);
      await this.registrants.setNotes(registrantId, notes);
      return { success: true, message: "Notes updated successfully!" };
    } catch (error) {
      return this.fail("Error updating notes", registrantId, error);
    }
  }
}
