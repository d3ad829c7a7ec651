/**
 * Checks on card content blocks.
 *
 * Generated content always passes; these exist for content that is edited
 * after generation and handed back through `ScenarioCard.withContent`.
 */

import { ValidationError } from '../errors';
import type { ScenarioContent, Shape, Visibility } from '../types/scenario';
import { isWithinTable } from './collision';
import type { TableSize } from './tableSize';

export const MAX_NAME_LENGTH = 120;
export const MAX_DESCRIPTION_LENGTH = 2000;
export const MAX_VICTORY_POINTS = 100;

function checkText(field: string, value: string, max: number, allowEmpty = false): void {
  if (!allowEmpty && value.trim() === '') {
    throw new ValidationError(field, `${field} must not be empty`);
  }
  if (value.length > max) {
    throw new ValidationError(field, `${field} must be at most ${max} characters`, {
      length: value.length,
    });
  }
}

function checkShape(field: string, shape: Shape, table: TableSize): void {
  if (!isWithinTable(shape, table.widthMm, table.heightMm)) {
    throw new ValidationError(field, `${field} lies outside the ${table.toString()} table`);
  }
}

/**
 * `sharedWith` may only list actors when the card is actually shared.
 */
export function validateSharedWithVisibility(
  visibility: Visibility,
  sharedWith: readonly string[]
): void {
  if (sharedWith.length > 0 && visibility !== 'shared') {
    throw new ValidationError(
      'sharedWith',
      `sharedWith must be empty unless visibility is shared (visibility is ${visibility})`
    );
  }
}

export function validateScenarioContent(content: ScenarioContent, table: TableSize): void {
  content.deploymentZones.forEach((zone, i) => {
    checkText(`deploymentZones[${i}].name`, zone.name, MAX_NAME_LENGTH);
    checkText(
      `deploymentZones[${i}].description`,
      zone.description,
      MAX_DESCRIPTION_LENGTH,
      true
    );
    checkShape(`deploymentZones[${i}].shape`, zone.shape, table);
  });

  content.scenography.forEach((piece, i) => {
    checkText(`scenography[${i}].name`, piece.name, MAX_NAME_LENGTH);
    checkShape(`scenography[${i}].shape`, piece.shape, table);
  });

  content.objectives.forEach((objective, i) => {
    checkText(`objectives[${i}].name`, objective.name, MAX_NAME_LENGTH);
    checkText(
      `objectives[${i}].description`,
      objective.description,
      MAX_DESCRIPTION_LENGTH,
      true
    );
    objective.markers.forEach((marker, j) =>
      checkShape(`objectives[${i}].markers[${j}]`, marker, table)
    );
  });

  const ruleNames = new Set<string>();
  content.specialRules.forEach((rule, i) => {
    checkText(`specialRules[${i}].name`, rule.name, MAX_NAME_LENGTH);
    checkText(`specialRules[${i}].description`, rule.description, MAX_DESCRIPTION_LENGTH, true);
    const key = rule.name.trim().toLowerCase();
    if (ruleNames.has(key)) {
      throw new ValidationError(`specialRules[${i}].name`, `duplicate special rule: ${rule.name}`);
    }
    ruleNames.add(key);
  });

  content.victoryPoints.forEach((condition, i) => {
    checkText(`victoryPoints[${i}].name`, condition.name, MAX_NAME_LENGTH);
    if (
      !Number.isInteger(condition.points) ||
      condition.points <= 0 ||
      condition.points > MAX_VICTORY_POINTS
    ) {
      throw new ValidationError(
        `victoryPoints[${i}].points`,
        `points must be an integer in 1..${MAX_VICTORY_POINTS}`,
        { points: condition.points }
      );
    }
  });

  content.narrativeHooks.forEach((hook, i) => {
    checkText(`narrativeHooks[${i}].text`, hook.text, MAX_DESCRIPTION_LENGTH);
  });
}
