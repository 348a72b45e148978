export function classPatternSeed(classIndex: number): number {
  return (classIndex * 50 + 10) % 256;
}

// Stand-in image content: a byte ramp whose starting value identifies the class.
export function generateSimulatedImage(classIndex: number, sizeBytes: number): Uint8Array {
  const seed = classPatternSeed(classIndex);
  const bytes = new Uint8Array(sizeBytes);
  for (let i = 0; i < sizeBytes; i += 1) {
    bytes[i] = (seed + i) % 256;
  }
  return bytes;
}
