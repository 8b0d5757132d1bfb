import path from "node:path";

export const normalizePath = (p: string): string => p.replace(/\\/g, "/");

export const getBasename = (p: string): string => path.basename(normalizePath(p));

/**
 * Device-side path of a pushed file. The device is always POSIX.
 */
export const joinRemotePath = (destination: string, fileName: string): string => {
  const dir = normalizePath(destination).replace(/\/+$/, "");
  return `${dir}/${fileName}`;
};
