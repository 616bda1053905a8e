import type { Repositories } from "./types.js";

let repositories: Repositories | null = null;

export const initRepositories = (repos: Repositories) => {
  repositories = repos;
  return repositories;
};

export const getRepositories = (): Repositories => {
  if (!repositories) throw new Error("Repositories not initialized");
  return repositories;
};
