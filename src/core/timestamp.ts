/** `M:SS`, minutes unpadded: 5 -> "0:05", 754.9 -> "12:34". */
export function formatTimestamp(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.floor(seconds) % 60;
  return `${minutes}:${String(remainingSeconds).padStart(2, '0')}`;
}
