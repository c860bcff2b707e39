export function formatTimestampSuffix(date: Date): string {
  const day = [date.getFullYear(), pad(date.getMonth() + 1), pad(date.getDate())].join("");
  const time = [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join("");
  return `${day}_${time}`;
}

export function timestampedName(name: string, date: Date): string {
  return `${name}_${formatTimestampSuffix(date)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
