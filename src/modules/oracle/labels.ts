import { EntityFinding } from '../../types';

/**
 * Every label a finding carries. Backends fill either `group_label` (aggregated
 * spans) or `label` (per-token tags), sometimes both.
 */
export function entityLabels(finding: EntityFinding): string[] {
    const labels: string[] = [];
    if (finding.group_label !== undefined) labels.push(finding.group_label);
    if (finding.label !== undefined && finding.label !== finding.group_label) labels.push(finding.label);
    return labels;
}

/** Either field naming the target qualifies. */
export function isTargetEntity(finding: EntityFinding, targetLabel: string): boolean {
    return entityLabels(finding).includes(targetLabel);
}
