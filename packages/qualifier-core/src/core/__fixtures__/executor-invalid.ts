export const main = "not callable";
