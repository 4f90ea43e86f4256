/**
 * "LeBron James" -> "lebron_james_stats_card.png"
 */
export function cardFileName(playerName: string): string {
  const slug = playerName
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9_-]/g, '');
  return `${slug || 'player'}_stats_card.png`;
}
