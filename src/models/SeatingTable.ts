// src/models/SeatingTable.ts

import mongoose, { Schema } from "mongoose";

export interface ISeatingTable {
  eventId: string;
  tableId: string;
  label: string;
  labelKey: string; // normalized label, unique per event
  capacity: number;
}

const SeatingTableSchema = new Schema<ISeatingTable>(
  {
    eventId: { type: String, required: true },
    tableId: { type: String, required: true },
    label: { type: String, required: true },
    labelKey: { type: String, required: true },
    capacity: { type: Number, required: true, min: 1 },
  },
  {
    collection: "tables",
    timestamps: true,
  },
);

SeatingTableSchema.index({ eventId: 1, tableId: 1 }, { unique: true });
SeatingTableSchema.index({ eventId: 1, labelKey: 1 }, { unique: true });

export const SeatingTableModel: mongoose.Model<ISeatingTable> =
  mongoose.models.SeatingTable ??
  mongoose.model<ISeatingTable>("SeatingTable", SeatingTableSchema);
