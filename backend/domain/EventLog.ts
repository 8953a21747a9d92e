import type { ISODateString, ISODateTimeString } from "./CalendarDate";

// One recorded cycle start.
// - Immutable once created; only `updatedAt` may be touched.
// - At most one log per (ownerKey, startDate) calendar day. Storage enforces it.
export interface EventLog {
  readonly id: string;
  readonly startDate: ISODateString;
  readonly createdAt: ISODateTimeString;
  readonly updatedAt?: ISODateTimeString;
  readonly ownerKey?: string;
}
