import { plainToInstance } from 'class-transformer';
import { ListNotificationsQueryDto } from '../../notification/dto/notification.dto';

describe('query transforms', () => {
  it('reads boolean query flags from text', () => {
    const parse = (unread_only: string) =>
      plainToInstance(ListNotificationsQueryDto, { unread_only }).unread_only;

    expect(parse('true')).toBe(true);
    expect(parse('1')).toBe(true);
    expect(parse('YES')).toBe(true);
    expect(parse('false')).toBe(false);
    expect(parse('0')).toBe(false);
  });
});
