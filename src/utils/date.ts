const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

/**
 * 投稿日の表示形式 例: "October 05, 2026"
 */
export function formatPostDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0");
  return `${MONTHS[date.getMonth()]} ${day}, ${date.getFullYear()}`;
}
