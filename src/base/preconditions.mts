export const Preconditions = {
  checkExists<T>(value: T, errorMessage?: string): NonNullable<T> {
    if (value === null || value === undefined) {
      throw new Error(errorMessage ?? "Value cannot be null");
    }

    return value;
  },

  checkArgument(condition: boolean, errorMessage?: string): void {
    if (!condition) {
      throw new Error(errorMessage ?? "Invalid argument");
    }
  },
};
