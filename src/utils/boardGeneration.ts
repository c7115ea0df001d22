import { InvalidParameterError } from './errors';

// The sixteen six-sided cubes of a standard Boggle set; "Q" stands for the "Qu" face
export const STANDARD_CUBES: readonly string[] = [
  'RIFOBX', 'IFEHEY', 'DENOWS', 'UTOKND',
  'HMSRAO', 'LUPETS', 'ACITOA', 'YLGKUE',
  'QBMJOA', 'EHISPN', 'VETIGN', 'BALIYT',
  'EZAVND', 'RALESC', 'UWILRG', 'PACEMD'
];

function randomIndex(length: number, random: () => number): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * Rolls a board: the cubes are shuffled into the tray and each shows one
 * face. `random` returns numbers in [0, 1) like Math.random.
 */
export function shakeBoard(
  width: number = 4,
  height: number = 4,
  cubes: readonly string[] = STANDARD_CUBES,
  random: () => number = Math.random
): string[][] {
  if (!Number.isInteger(width) || width < 1) {
    throw new InvalidParameterError('width', 'expected a positive integer');
  }
  if (!Number.isInteger(height) || height < 1) {
    throw new InvalidParameterError('height', 'expected a positive integer');
  }
  if (width * height > cubes.length) {
    throw new InvalidParameterError('cubes', `a ${width}x${height} board needs ${width * height} cubes, received ${cubes.length}`);
  }
  if (cubes.some(cube => cube.length === 0)) {
    throw new InvalidParameterError('cubes', 'every cube needs at least one face');
  }

  // Fisher-Yates
  const tray = [...cubes];
  for (let i = tray.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, random);
    [tray[i], tray[j]] = [tray[j], tray[i]];
  }

  return Array.from({ length: height }, (_, row) =>
    Array.from({ length: width }, (_, col) => {
      const cube = tray[row * width + col];
      return cube[randomIndex(cube.length, random)];
    })
  );
}
