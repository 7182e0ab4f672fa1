import * as crypto from 'node:crypto';

function shuffleArray<T>(inputArray: T[]): T[] {
  const outputArray = [...inputArray];
  for (let i = outputArray.length - 1; i > 0; i -= 1) {
    const j = crypto.randomInt(i + 1);
    const temp = outputArray[i];
    outputArray[i] = outputArray[j];
    outputArray[j] = temp;
  }
  return outputArray;
}

// Meeting passwords may only contain [a-z A-Z 0-9 @ - _ * !] and are at
// most 10 characters long.
export function generateMeetingPassword(): string {
  const symbols = '@-_*!';
  const substrings = [
    crypto.randomBytes(2).toString('hex'),
    crypto.randomBytes(2).toString('hex').toUpperCase(),
    symbols[crypto.randomInt(symbols.length)],
    symbols[crypto.randomInt(symbols.length)],
  ];
  return shuffleArray(substrings).join('');
}
