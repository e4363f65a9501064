// src/models/IssuedToken.ts

import mongoose, { Schema } from "mongoose";

// Every token ever minted; rows are never deleted, so tokens are never reissued
export interface IIssuedToken {
  token: string;
  eventId: string;
  issuedAt: Date;
}

const IssuedTokenSchema = new Schema<IIssuedToken>(
  {
    token: { type: String, required: true, unique: true },
    eventId: { type: String, required: true },
    issuedAt: { type: Date, required: true },
  },
  {
    collection: "issued_tokens",
    timestamps: false,
  },
);

export const IssuedTokenModel: mongoose.Model<IIssuedToken> =
  mongoose.models.IssuedToken ??
  mongoose.model<IIssuedToken>("IssuedToken", IssuedTokenSchema);
