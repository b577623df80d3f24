export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function toSigned8(byte: number): number {
  return byte > 127 ? byte - 256 : byte;
}
