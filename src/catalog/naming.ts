// Physical names are snake_case by convention; logical names follow the
// CRM's PascalCase. Already mixed-case column names are kept as they are.

export function toFieldName(columnName: string): string {
  const isSnakeOrLower = columnName.includes('_') || columnName === columnName.toLowerCase();
  if (!isSnakeOrLower) return columnName;
  return columnName
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join('');
}

/** `FirstName` → `First Name`, `Id` → `Id`. */
export function toLabel(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1 $2').replace(/_/g, ' ');
}

export function pluralize(word: string): string {
  if (/[^aeiou]y$/i.test(word)) return `${word.slice(0, -1)}ies`;
  if (/(s|x|z|ch|sh)$/i.test(word)) return `${word}es`;
  return `${word}s`;
}

export function keyPrefixFor(objectName: string): string {
  return objectName.slice(0, 3).toUpperCase();
}

/** `CampaignId` → `Campaign`; names without the suffix get `__r`. */
export function toRelationshipName(fieldName: string): string {
  if (fieldName.length > 2 && fieldName.endsWith('Id')) return fieldName.slice(0, -2);
  return `${fieldName}__r`;
}

const NOT_CREATEABLE = new Set(['id', 'createddate', 'lastmodifieddate']);
const NOT_UPDATEABLE = new Set(['id', 'createddate']);

export function isCreateable(fieldName: string, isKey: boolean): boolean {
  return !isKey && !NOT_CREATEABLE.has(fieldName.toLowerCase());
}

export function isUpdateable(fieldName: string, isKey: boolean): boolean {
  return !isKey && !NOT_UPDATEABLE.has(fieldName.toLowerCase());
}
