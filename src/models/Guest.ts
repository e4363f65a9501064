// src/models/Guest.ts

import mongoose, { Schema } from "mongoose";
import type { CheckInStatus } from "../types/seating.type";

export interface IGuest {
  eventId: string;
  guestId: string;
  name: string;
  naturalKey: string;
  contact: string | null;
  dietary: string | null;
  tableId: string | null; // null while unassigned
  seatNo: number | null;
  status: CheckInStatus;
  checkedInAt: Date | null;
  token: string;
  createdAt: Date;
}

const GuestSchema = new Schema<IGuest>(
  {
    eventId: { type: String, required: true },
    guestId: { type: String, required: true },
    name: { type: String, required: true },
    naturalKey: { type: String, required: true },
    contact: { type: String, default: null },
    dietary: { type: String, default: null },
    tableId: { type: String, default: null },
    seatNo: { type: Number, default: null, min: 1 },
    status: {
      type: String,
      enum: ["not_arrived", "checked_in"],
      default: "not_arrived",
    },
    checkedInAt: { type: Date, default: null },
    token: { type: String, required: true, unique: true },
    createdAt: { type: Date, required: true },
  },
  {
    collection: "guests",
    timestamps: false,
  },
);

GuestSchema.index({ eventId: 1, guestId: 1 }, { unique: true });
GuestSchema.index({ eventId: 1, naturalKey: 1 }, { unique: true });
GuestSchema.index({ eventId: 1, tableId: 1, seatNo: 1 });

export const GuestModel: mongoose.Model<IGuest> =
  mongoose.models.Guest ?? mongoose.model<IGuest>("Guest", GuestSchema);
