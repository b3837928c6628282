// src/utils/phone.ts
// Local mobile format: "03" followed by nine digits
const MOBILE_NUMBER = /(03\d{9})/;

export function detectPhoneNumber(text: string): string | null {
    const match = MOBILE_NUMBER.exec(text.replace(/[\s-]/g, ""));
    return match ? match[1] : null;
}
