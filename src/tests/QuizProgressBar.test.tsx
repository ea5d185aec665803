import { render, screen } from '@testing-library/react';
import { describe, test, expect } from 'vitest';
import QuizProgressBar from '../components/widgets/QuizProgressBar';

describe('QuizProgressBar', () => {
  test('exposes progress as a percentage', () => {
    render(<QuizProgressBar currentIndex={1} total={4} />);
    expect(screen.getByRole('progressbar', { name: 'Quiz progress' })).toHaveAttribute('aria-valuenow', '50');
  });

  test('last question is full', () => {
    render(<QuizProgressBar currentIndex={9} total={10} />);
    expect(screen.getByRole('progressbar')).toHaveAttribute('aria-valuenow', '100');
  });

  test('empty quiz shows no progress and no label', () => {
    render(<QuizProgressBar currentIndex={0} total={0} showLabel />);
    expect(screen.getByRole('progressbar')).toHaveAttribute('aria-valuenow', '0');
    expect(screen.queryByText(/Question/)).not.toBeInTheDocument();
  });

  test('renders the question label on request', () => {
    render(<QuizProgressBar currentIndex={2} total={10} showLabel />);
    expect(screen.getByText('Question 3')).toBeInTheDocument();
    expect(screen.getByText('3 of 10')).toBeInTheDocument();
    expect(screen.getByRole('progressbar')).toHaveAttribute('aria-valuenow', '30');
  });
});
