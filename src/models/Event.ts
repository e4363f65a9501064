// src/models/Event.ts

import mongoose, { Schema } from "mongoose";
import { TABLE_CAPACITY_LIMIT } from "../types/seating.type";

export interface IEvent {
  eventId: string;
  name: string;
  date: Date | null;
  organizerEmail: string | null;
  publicCode: string;
  tableCapacityLimit: number;
  revision: number; // bumped by every committed seating transaction
  createdAt: Date;
}

const EventSchema = new Schema<IEvent>(
  {
    eventId: { type: String, required: true, unique: true },
    name: { type: String, required: true },
    date: { type: Date, default: null },
    organizerEmail: { type: String, default: null },
    publicCode: { type: String, required: true, unique: true },
    tableCapacityLimit: { type: Number, default: TABLE_CAPACITY_LIMIT },
    revision: { type: Number, default: 0 },
    createdAt: { type: Date, required: true },
  },
  {
    collection: "events",
    timestamps: false,
  },
);

export const EventModel: mongoose.Model<IEvent> =
  mongoose.models.Event ?? mongoose.model<IEvent>("Event", EventSchema);
