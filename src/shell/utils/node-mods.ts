/**
 * Ре-экспорт встроенных модулей Node для SHELL слоя.
 *
 * Инвариант: экспортируем объекты через константы, избегая `export *` для модулей с `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export const fs = fsNS;
export const fsPromises = fsNS.promises;
export const path = pathNS;
