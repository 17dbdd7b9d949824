const EXPLICIT_PATTERN = /^[{[]([^[\]{}]*)[}\]]\s*([\s\S]*)$/;

function matchesCondition(condition: string, count: number): boolean {
  if (!condition.includes(",")) {
    return Number(condition) === count;
  }

  const [from = "", to = ""] = condition.split(",", 2).map((part) => part.trim());
  const lower = from === "*" ? -Infinity : Number(from);
  const upper = to === "*" ? Infinity : Number(to);
  return count >= lower && count <= upper;
}

/**
 * Picks the segment of a "|"-separated line for `count`. Segments may carry
 * explicit conditions, `{0} None|[1,19] Some|[20,*] Many`; otherwise the
 * first segment is singular and the second plural.
 */
export function selectMessage(line: string, count: number): string {
  const segments = line.split("|");

  for (const segment of segments) {
    const match = EXPLICIT_PATTERN.exec(segment.trim());
    if (match && matchesCondition(match[1] ?? "", count)) {
      return match[2] ?? "";
    }
  }

  const plain = segments.map((segment) => segment.trim().replace(EXPLICIT_PATTERN, "$2"));
  if (plain.length === 1) {
    return plain[0] ?? "";
  }
  return (count === 1 ? plain[0] : plain[1]) ?? "";
}
