// ============================================
// MELIAPP - QR Service
// ============================================

import QRCode from 'qrcode';
import { env } from '../config/env.js';

export interface QrOptions {
  scale?: number;
}

const MIN_SCALE = 1;
const MAX_SCALE = 40;

export class QrService {
  constructor(private baseUrl: string = env.PUBLIC_BASE_URL) {}

  profileUrl(userId: string): string {
    return `${this.baseUrl.replace(/\/$/, '')}/profile/${userId}`;
  }

  lotUrl(lotId: string): string {
    return `${this.baseUrl.replace(/\/$/, '')}/lote/${lotId}`;
  }

  async toPng(content: string, options: QrOptions = {}): Promise<Buffer> {
    return QRCode.toBuffer(content, {
      type: 'png',
      errorCorrectionLevel: 'M',
      margin: 2,
      scale: this.clampScale(options.scale),
    });
  }

  async toDataUrl(content: string, options: QrOptions = {}): Promise<string> {
    return QRCode.toDataURL(content, {
      type: 'image/png',
      errorCorrectionLevel: 'M',
      margin: 2,
      scale: this.clampScale(options.scale),
    });
  }

  private clampScale(scale: number | undefined): number {
    const value = scale ?? env.QR_DEFAULT_SCALE;
    return Math.min(MAX_SCALE, Math.max(MIN_SCALE, Math.round(value)));
  }
}
