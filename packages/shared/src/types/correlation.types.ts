import { AccountCategory } from './statement.types';
import { RelationshipType } from './analysis-config.types';

export interface CorrelationViolation {
  ruleId: number;
  ruleName: string;
  ruleDescription: string;
  relationshipType: RelationshipType;
  periodFrom: string;
  periodTo: string;
  primaryCategory: AccountCategory;
  correlatedCategory: AccountCategory;
  primaryAccounts: string[];
  correlatedAccounts: string[];
  primaryChangePercent: number;
  correlatedChangePercent: number;
  expectedChangePercent: number;
  deviationScore: number;
  description: string;
}
