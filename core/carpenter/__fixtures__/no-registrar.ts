export const tables = ['products'];
