// src/services/qr.service.ts

import QRCode from "qrcode";

const RENDER = {
  errorCorrectionLevel: "L",
  margin: 4,
  scale: 10,
} as const;

/** Renders portal links as QR codes: per guest (token) or per event (public code). */
export class QrService {
  constructor(private readonly baseUrl: string) {}

  guestPortalUrl(token: string): string {
    return `${this.portal()}?token=${encodeURIComponent(token)}`;
  }

  eventPortalUrl(publicCode: string): string {
    return `${this.portal()}?event=${encodeURIComponent(publicCode)}`;
  }

  png(url: string): Promise<Buffer> {
    return QRCode.toBuffer(url, { ...RENDER, type: "png" });
  }

  private portal(): string {
    return `${this.baseUrl.replace(/\/+$/, "")}/guest/portal`;
  }
}
