// CHANGE: Configuration and CLI option types
// PURITY: CORE
// INVARIANT: Fully resolved; no optional rule settings remain after loading

import type { ResolvedRuleSettings } from "./rule.js";

/**
 * Конфигурация линтера после слияния guidelint.config.json с настройками по умолчанию.
 *
 * @property extensions Расширения файлов, которые проверяются при обходе директорий
 * @property ignore Имена директорий, которые пропускаются при обходе
 * @property rules Настройки каждого правила
 */
export interface LinterConfig {
	readonly extensions: ReadonlyArray<string>;
	readonly ignore: ReadonlyArray<string>;
	readonly rules: ResolvedRuleSettings;
}

export type ReportFormat = "stylish" | "json" | "sarif";

/**
 * Опции командной строки.
 *
 * @property targetPaths Файлы или директории для проверки
 * @property format Формат отчёта
 * @property configPath Явный путь к файлу конфигурации
 * @property outputPath Файл, в который пишется отчёт вместо stdout
 * @property maxWarnings Допустимое число предупреждений
 * @property quiet Показывать только ошибки
 * @property listRules Вывести список правил и выйти
 */
export interface CLIOptions {
	readonly targetPaths: ReadonlyArray<string>;
	readonly format: ReportFormat;
	readonly configPath?: string;
	readonly outputPath?: string;
	readonly maxWarnings?: number;
	readonly quiet: boolean;
	readonly listRules: boolean;
}
