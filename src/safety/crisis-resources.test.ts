import { describe, it, expect } from 'vitest';
import { containsCrisisResources, formatCrisisResources } from './crisis-resources.js';

const resources = {
  crisisHotlines: ['Lifeline: 988'],
  emergencyServices: ['Emergency: 911', 'Local Emergency Room'],
  professionalHelp: ['Your therapist'],
};

describe('crisis-resources', () => {
  it('should format every category in order', () => {
    expect(formatCrisisResources(resources)).toBe(
      '**Immediate Help Resources:**\n\n' +
        '**Crisis Hotlines:**\n• Lifeline: 988\n\n' +
        '**Emergency Services:**\n• Emergency: 911\n• Local Emergency Room\n\n' +
        '**Professional Help:**\n• Your therapist'
    );
  });

  it('should detect the 988 number or a listed resource', () => {
    expect(containsCrisisResources('Call 988 any time', resources)).toBe(true);
    expect(containsCrisisResources('Go to your local emergency room', resources)).toBe(true);
    expect(containsCrisisResources('Talk to a friend', resources)).toBe(false);
  });

  it('should not count professional help alone as crisis resources', () => {
    expect(containsCrisisResources('Ask your therapist', resources)).toBe(false);
  });
});
