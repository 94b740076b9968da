// CHANGE: SARIF 2.1.0 subset emitted by the sarif reporter
// SOURCE: https://docs.oasis-open.org/sarif/sarif/v2.1.0/sarif-v2.1.0.html
// PURITY: CORE

export type SarifLevel = "error" | "warning";

/**
 * Локация в SARIF формате.
 */
export interface SarifLocation {
	readonly physicalLocation: {
		readonly artifactLocation: {
			readonly uri: string;
		};
		readonly region: {
			readonly startLine: number;
			readonly startColumn: number;
			readonly endLine?: number;
			readonly endColumn?: number;
		};
	};
}

/**
 * Результат проверки в SARIF формате.
 */
export interface SarifResult {
	readonly ruleId: string;
	readonly level: SarifLevel;
	readonly message: {
		readonly text: string;
	};
	readonly locations: ReadonlyArray<SarifLocation>;
}

export interface SarifRuleDescriptor {
	readonly id: string;
	readonly shortDescription: {
		readonly text: string;
	};
	readonly defaultConfiguration: {
		readonly level: SarifLevel;
	};
}

/**
 * SARIF отчет guidelint (один запуск).
 */
export interface SarifReport {
	readonly $schema: string;
	readonly version: "2.1.0";
	readonly runs: ReadonlyArray<{
		readonly tool: {
			readonly driver: {
				readonly name: string;
				readonly rules: ReadonlyArray<SarifRuleDescriptor>;
			};
		};
		readonly results: ReadonlyArray<SarifResult>;
	}>;
}
