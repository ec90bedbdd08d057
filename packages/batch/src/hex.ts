export function stripHexPrefix(code: string): string {
  return code.startsWith('0x') || code.startsWith('0X') ? code.slice(2) : code;
}
