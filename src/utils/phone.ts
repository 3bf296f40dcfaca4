/**
 * Normalises a Russian phone number to 11 digits starting with 7.
 * Returns an empty string when the input cannot be a valid number.
 */
export function normalizePhone(input: string): string {
  const digits = input.replace(/\D/g, '');
  if (digits.length === 11) {
    if (digits.startsWith('8')) return `7${digits.slice(1)}`;
    if (digits.startsWith('7')) return digits;
    return '';
  }
  if (digits.length === 10) return `7${digits}`;
  return '';
}

export function formatPhoneForDisplay(phone: string): string {
  const d = phone.replace(/\D/g, '');
  if (d.length === 11 && d.startsWith('7')) {
    return `+7 (${d.slice(1, 4)}) ${d.slice(4, 7)}-${d.slice(7, 9)}-${d.slice(9)}`;
  }
  if (d.length === 10) {
    return `(${d.slice(0, 3)}) ${d.slice(3, 6)}-${d.slice(6, 8)}-${d.slice(8)}`;
  }
  return phone;
}
