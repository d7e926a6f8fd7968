import inquirer from 'inquirer';
import { InquirerConfirmer } from './prompts';

jest.mock('inquirer', () => ({
  prompt: jest.fn()
}));

const mockPrompt = jest.mocked(inquirer.prompt);

describe('InquirerConfirmer', () => {
  it('should ask a confirm question that defaults to no', async () => {
    mockPrompt.mockResolvedValue({ confirmed: true });

    const answer = await new InquirerConfirmer().askConfirmation('Delete user data too?');

    expect(answer).toBe(true);
    expect(mockPrompt).toHaveBeenCalledWith([
      { type: 'confirm', name: 'confirmed', message: 'Delete user data too?', default: false },
    ]);
  });

  it('should treat a missing answer as no', async () => {
    mockPrompt.mockResolvedValue({});

    expect(await new InquirerConfirmer().askConfirmation('Continue anyway?')).toBe(false);
  });
});
