export const num = (value: unknown, defaultValue: number) =>
  value !== undefined && value !== "" && Number.isFinite(Number(value)) ? Number(value) : defaultValue
