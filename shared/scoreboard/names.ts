const LOWER = 'a-záéíóúýčďěňřšťžů';
const UPPER = 'A-ZÁÉÍÓÚÝČĎĚŇŘŠŤŽŮ';

const WORD_BOUNDARY = new RegExp(`([${LOWER}])([${UPPER}])`, 'g');

/** "JiříČervenka" -> "Jiří Červenka". */
export function normalizePlayerName(name: string): string {
  return name.replace(WORD_BOUNDARY, '$1 $2');
}
