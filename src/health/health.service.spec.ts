import { VoiceSynthesisService } from '../voice/voice-synthesis.service';
import { HealthService } from './health.service';

describe('HealthService', () => {
  const voiceMock = {
    isEnabled: jest.fn(),
  };

  it('reports a configured voice api', () => {
    voiceMock.isEnabled.mockReturnValue(true);
    const service = new HealthService(voiceMock as unknown as VoiceSynthesisService);

    const report = service.check();

    expect(report.status).toBe('ok');
    expect(report.services.voice.status).toBe('configured');
    expect(Number.isNaN(Date.parse(report.timestamp))).toBe(false);
  });

  it('reports a disabled voice api', () => {
    voiceMock.isEnabled.mockReturnValue(false);
    const service = new HealthService(voiceMock as unknown as VoiceSynthesisService);

    expect(service.check().services.voice.status).toBe('disabled');
  });
});
