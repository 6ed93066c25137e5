/**
 * Case conversions between the snake_case names used in declarations and
 * the camelCase names resources are written with.
 */

export function snakeToCamel(input: string, upper = false): string {
  const words = input.split('_').filter(word => word.length > 0);
  return words
    .map((word, i) => (i === 0 && !upper ? word : word[0].toUpperCase() + word.slice(1)))
    .join('');
}

export function camelToSnake(input: string): string {
  if (input.length === 0) return input;

  let result = input[0].toLowerCase();
  for (let i = 1; i < input.length; i++) {
    const letter = input[i];
    if (isUpper(letter)) {
      const prevLower = isLower(input[i - 1]);
      const nextLower = i < input.length - 1 && isLower(input[i + 1]);
      if (prevLower || nextLower) {
        result += '_';
      }
    }
    result += letter.toLowerCase();
  }
  return result;
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLower(ch: string): boolean {
  return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}
