// Exports nothing the loader can register
export const addMissingClass = "not a migration";
