import type { CarryoverSet, MonthUnit, TaskForest, WeekDocument } from '../types/journal';
import { EMPTY_FOREST } from '../types/journal';
import { concatForests, copyForest } from './taskForest';

/**
 * Marks the nodes that move to the next period: a node is selected when it is
 * still open or when any descendant is selected. Parents precede children in
 * the arena, so one pass from the last index back visits every child before
 * its parent.
 */
export function selectPending(forest: TaskForest): boolean[] {
  const selected = forest.nodes.map(node => !node.completed);
  for (let i = forest.nodes.length - 1; i >= 0; i--) {
    const parent = forest.nodes[i].parent;
    if (selected[i] && parent !== null) {
      selected[parent] = true;
    }
  }
  return selected;
}

/** Copy of the forest reduced to the selected nodes, depths renumbered from 0. */
export function carryForest(forest: TaskForest): TaskForest {
  if (forest.nodes.length === 0) return EMPTY_FOREST;
  const selected = selectPending(forest);
  return copyForest(forest, index => selected[index]);
}

/**
 * Tasks of a finished week that move to the next one. Only "Tareas del Día"
 * zones are read; "Tareas Completadas" is closed and never contributes.
 */
export function resolveCarryover(doc: WeekDocument): CarryoverSet {
  return {
    objectives: carryForest(doc.objectives),
    dayTasks: concatForests(doc.days.map(day => carryForest(day.tasks))),
  };
}

/** Pending month topics for the next MonthTopics document. */
export function resolveMonthCarryover(unit: MonthUnit): TaskForest {
  return unit.topics ? carryForest(unit.topics) : EMPTY_FOREST;
}
