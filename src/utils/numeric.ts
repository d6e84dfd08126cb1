// Absorbs binary floating-point noise such as 1.1 / 0.1 = 11.000000000000002
const EPSILON = 1e-9;

export const ceilTolerant = (value: number): number => {
  const ceiled = Math.ceil(value - EPSILON);
  // Math.ceil(-1e-9) is -0
  return ceiled === 0 ? 0 : ceiled;
};

export const floorTolerant = (value: number): number => Math.floor(value + EPSILON);

