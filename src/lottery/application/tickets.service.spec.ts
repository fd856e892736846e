import {
  AlreadyParticipatedException,
  DeadlinePassedException,
  NoWinningTicketException,
  RecentWinnerException,
  RegistrationClosedException,
  ValidationException,
} from '../../common/exceptions/domain.exceptions';
import { TicketStatus, WinnerInfo } from '../domain/ticket.entity';
import { TicketNumberTakenError, WeeklyTicketExistsError } from '../domain/ticket.repository';
import { TicketsService } from './tickets.service';
import { InMemoryTicketRepository } from '../../../test/fakes/in-memory-ticket.repository';

const tehran = (local: string) => new Date(`${local}+03:30`);
const WEEK_START = tehran('2026-10-17T08:00:00');
const SUNDAY = tehran('2026-10-18T10:00:00');

const validInfo: WinnerInfo = {
  fullName: 'Test Winner',
  nationalId: '123-456-7890',
  receivedDate: 'Thursday',
  selectedPeriod: 'Dinner',
  quantity: 2,
};

describe('TicketsService', () => {
  let repository: InMemoryTicketRepository;
  let service: TicketsService;

  beforeEach(() => {
    repository = new InMemoryTicketRepository();
    service = new TicketsService(repository);
  });

  describe('participate', () => {
    it('creates a pending ticket for the current registration week', async () => {
      const ticket = await service.participate('user-1', SUNDAY);

      expect(ticket.status).toBe(TicketStatus.PENDING);
      expect(ticket.ticketNumber).toMatch(/^[A-Z0-9]{10}$/);
      expect(ticket.weekStart).toBe('2026-10-17T04:30:00.000Z');
      expect(ticket.completionDeadline).toBeNull();
      expect(repository.tickets).toHaveLength(1);
    });

    it.each([
      ['Saturday before 08:00', '2026-10-17T07:59:59'],
      ['Wednesday 20:00', '2026-10-21T20:00:00'],
      ['Thursday', '2026-10-22T12:00:00'],
      ['Friday', '2026-10-23T12:00:00'],
    ])('rejects when registration is closed (%s)', async (_label, local) => {
      await expect(service.participate('user-1', tehran(local))).rejects.toThrow(
        RegistrationClosedException,
      );
      expect(repository.tickets).toHaveLength(0);
    });

    it('allows one ticket per user per week', async () => {
      await service.participate('user-1', SUNDAY);

      await expect(service.participate('user-1', tehran('2026-10-21T19:59:59'))).rejects.toThrow(
        AlreadyParticipatedException,
      );
      await expect(service.participate('user-2', SUNDAY)).resolves.toBeDefined();
      await expect(service.participate('user-1', tehran('2026-10-24T08:00:00'))).resolves.toBeDefined();
    });

    it('rejects users who won within the last 180 days', async () => {
      repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: tehran('2026-04-25T08:00:00'),
        createdAt: tehran('2026-05-01T10:00:00'),
      });

      await expect(service.participate('user-1', SUNDAY)).rejects.toThrow(RecentWinnerException);
    });

    it('lets older winners participate again', async () => {
      repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: tehran('2026-03-28T08:00:00'),
        createdAt: tehran('2026-04-01T10:00:00'),
      });

      await expect(service.participate('user-1', SUNDAY)).resolves.toBeDefined();
    });

    it('reports an existing weekly ticket before a recent win', async () => {
      repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: WEEK_START,
        createdAt: tehran('2026-10-17T09:00:00'),
      });

      await expect(service.participate('user-1', SUNDAY)).rejects.toThrow(
        AlreadyParticipatedException,
      );
    });

    it('retries with another number when the number is taken concurrently', async () => {
      const create = jest
        .spyOn(repository, 'create')
        .mockRejectedValueOnce(new TicketNumberTakenError('AAAAAAAAAA'));

      const ticket = await service.participate('user-1', SUNDAY);

      expect(create).toHaveBeenCalledTimes(2);
      expect(repository.tickets.map((t) => t.ticketNumber)).toEqual([ticket.ticketNumber]);
    });

    it('maps a concurrent weekly ticket to already participated', async () => {
      jest.spyOn(repository, 'create').mockRejectedValueOnce(new WeeklyTicketExistsError('user-1'));

      await expect(service.participate('user-1', SUNDAY)).rejects.toThrow(
        AlreadyParticipatedException,
      );
    });
  });

  describe('completeWinnerInfo', () => {
    const seedWinner = () =>
      repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: WEEK_START,
        createdAt: SUNDAY,
        receivedDate: 'Thursday',
        selectedPeriod: 'Lunch',
      });

    it('requires a winning ticket', async () => {
      repository.seed({ userId: 'user-1', weekStart: WEEK_START, createdAt: SUNDAY });

      await expect(service.completeWinnerInfo('user-1', validInfo, SUNDAY)).rejects.toThrow(
        NoWinningTicketException,
      );
    });

    it('saves normalized details until just before Thursday 08:00', async () => {
      const winner = seedWinner();

      const saved = await service.completeWinnerInfo(
        'user-1',
        { ...validInfo, fullName: '  Test Winner ' },
        tehran('2026-10-22T07:59:59'),
      );

      expect(saved).toMatchObject({
        id: winner.id,
        fullName: 'Test Winner',
        nationalId: '1234567890',
        receivedDate: 'Thursday',
        selectedPeriod: 'Dinner',
        quantity: 2,
        completionDeadline: '2026-10-22T04:30:00.000Z',
      });
    });

    it('rejects at the deadline', async () => {
      seedWinner();

      await expect(
        service.completeWinnerInfo('user-1', validInfo, tehran('2026-10-22T08:00:00')),
      ).rejects.toThrow(DeadlinePassedException);
    });

    it('checks the deadline before validating fields', async () => {
      seedWinner();

      await expect(
        service.completeWinnerInfo('user-1', { ...validInfo, quantity: 9 }, tehran('2026-10-22T09:00:00')),
      ).rejects.toThrow(DeadlinePassedException);
    });

    it('reports every invalid field', async () => {
      seedWinner();

      await expect(
        service.completeWinnerInfo(
          'user-1',
          { fullName: ' ', nationalId: '12345', receivedDate: '', selectedPeriod: 'Lunch', quantity: 4 },
          SUNDAY,
        ),
      ).rejects.toMatchObject({
        details: {
          fullName: ['Full name is required'],
          nationalId: ['National ID must be exactly 10 digits'],
          receivedDate: ['Received date is required'],
          quantity: ['Quantity must be an integer between 1 and 3'],
        },
      });
    });

    it.each([0, 1.5, 4])('rejects quantity %s', async (quantity) => {
      seedWinner();

      await expect(
        service.completeWinnerInfo('user-1', { ...validInfo, quantity }, SUNDAY),
      ).rejects.toThrow(ValidationException);
    });

    it('treats a ticket cancelled mid-update as no winning ticket', async () => {
      seedWinner();
      jest.spyOn(repository, 'saveWinnerInfo').mockResolvedValueOnce(null);

      await expect(service.completeWinnerInfo('user-1', validInfo, SUNDAY)).rejects.toThrow(
        NoWinningTicketException,
      );
    });
  });

  describe('sweepIncompleteWinners', () => {
    it('cancels incomplete winners from Thursday 08:00 and is idempotent', async () => {
      const incomplete = repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: WEEK_START,
        createdAt: SUNDAY,
        receivedDate: 'Thursday',
        selectedPeriod: 'Lunch',
      });
      const complete = repository.seed({
        userId: 'user-2',
        status: TicketStatus.WON,
        weekStart: WEEK_START,
        createdAt: SUNDAY,
        fullName: 'Test Winner',
        nationalId: '1234567890',
        receivedDate: 'Thursday',
        selectedPeriod: 'Lunch',
        quantity: 1,
      });
      const pending = repository.seed({ userId: 'user-3', weekStart: WEEK_START, createdAt: SUNDAY });

      await expect(service.sweepIncompleteWinners(tehran('2026-10-22T07:59:59'))).resolves.toBe(0);
      await expect(service.sweepIncompleteWinners(tehran('2026-10-22T08:00:00'))).resolves.toBe(1);
      await expect(service.sweepIncompleteWinners(tehran('2026-10-22T08:00:01'))).resolves.toBe(0);

      expect(repository.get(incomplete.id ?? '')?.status).toBe(TicketStatus.CANCELLED);
      expect(repository.get(complete.id ?? '')?.status).toBe(TicketStatus.WON);
      expect(repository.get(pending.id ?? '')?.status).toBe(TicketStatus.PENDING);
    });

    it('keeps a winner who completed details before the deadline', async () => {
      repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: WEEK_START,
        createdAt: SUNDAY,
      });

      await service.completeWinnerInfo('user-1', validInfo, tehran('2026-10-21T21:00:00'));

      await expect(service.sweepIncompleteWinners(tehran('2026-10-22T08:00:00'))).resolves.toBe(0);
    });

    it('keeps a Wednesday 20:00 winner until Thursday 08:00, then cancels it', async () => {
      const winner = repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: WEEK_START,
        createdAt: tehran('2026-10-21T20:00:00'),
      });

      await expect(service.sweepIncompleteWinners(tehran('2026-10-22T07:59:59'))).resolves.toBe(0);
      expect(repository.get(winner.id ?? '')?.status).toBe(TicketStatus.WON);

      await expect(service.sweepIncompleteWinners(tehran('2026-10-22T08:00:00'))).resolves.toBe(1);
      expect(repository.get(winner.id ?? '')?.status).toBe(TicketStatus.CANCELLED);
    });

    it('only loads winners that still miss details', async () => {
      repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: tehran('2026-04-04T08:00:00'),
        createdAt: tehran('2026-04-05T10:00:00'),
        fullName: 'Past Winner',
        nationalId: '1234567890',
        receivedDate: 'Thursday',
        selectedPeriod: 'Lunch',
        quantity: 1,
      });
      const byStatus = jest.spyOn(repository, 'findByStatus');
      const incomplete = jest.spyOn(repository, 'findIncompleteWinners');

      await expect(service.sweepIncompleteWinners(tehran('2026-10-22T08:00:00'))).resolves.toBe(0);

      expect(byStatus).not.toHaveBeenCalled();
      await expect(incomplete.mock.results[0].value).resolves.toEqual([]);
    });
  });

  describe('lookups', () => {
    it('returns the latest winning ticket with a previous-info flag', async () => {
      repository.seed({
        userId: 'user-1',
        status: TicketStatus.WON,
        weekStart: WEEK_START,
        createdAt: SUNDAY,
        fullName: 'Test Winner',
        nationalId: '1234567890',
      });

      const result = await service.getWinnerTicket('user-1');

      expect(result.hasPreviousInfo).toBe(true);
      expect(result.ticket.fullName).toBe('Test Winner');
      await expect(service.getWinnerTicket('user-2')).rejects.toThrow(NoWinningTicketException);
    });

    it('lists tickets newest first', async () => {
      repository.seed({ userId: 'user-1', ticketNumber: 'OLD0000000', createdAt: tehran('2026-10-04T10:00:00') });
      repository.seed({ userId: 'user-1', ticketNumber: 'NEW0000000', createdAt: SUNDAY });
      repository.seed({ userId: 'user-2', ticketNumber: 'OTHER00000', createdAt: SUNDAY });

      const result = await service.listUserTickets('user-1');

      expect(result.count).toBe(2);
      expect(result.results.map((t) => t.ticketNumber)).toEqual(['NEW0000000', 'OLD0000000']);
    });
  });
});
