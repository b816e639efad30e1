export type Principal =
  | { scheme: "api-key" }
  | { scheme: "bearer"; uid: string; email?: string };
