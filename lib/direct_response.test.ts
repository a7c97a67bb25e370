import { describe, expect, it } from 'vitest';
import {
  getAidaFramework,
  getCtaFormulas,
  getCtrTechniques,
  getHeadlineFormulas,
  renderDirectResponseGuide,
} from './direct_response';

describe('direct response library', () => {
  it('loads formulas and techniques', () => {
    expect(getHeadlineFormulas()).toHaveLength(10);
    expect(getCtaFormulas()).toHaveLength(10);
    expect(Object.keys(getCtrTechniques())).toEqual(['headline_techniques', 'copy_techniques', 'psychological_triggers']);
    expect(Object.keys(getAidaFramework())).toEqual(['attention', 'interest', 'desire', 'action']);
  });

  it('hands out copies', () => {
    getHeadlineFormulas().push('mutated');
    expect(getHeadlineFormulas()).toHaveLength(10);
  });

  it('renders a markdown guide', () => {
    const guide = renderDirectResponseGuide();

    expect(guide.startsWith('## Direct Response Marketing Principles:')).toBe(true);
    expect(guide).toContain('### AIDA Framework Implementation:\n- Attention: ');
    expect(guide).toContain('#### Psychological Triggers\n- ');
  });
});
