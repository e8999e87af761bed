import { randomUUID } from 'crypto';

export interface BookingRequest {
  date: string;
  time: string;
  contactName: string;
  email?: string;
  sessionId: string;
}

export interface Booking extends BookingRequest {
  id: string;
}

export interface CalendarService {
  availableSlots(date: string, signal?: AbortSignal): Promise<string[]>;
  /** Returns null when the slot is no longer free. */
  book(request: BookingRequest, signal?: AbortSignal): Promise<Booking | null>;
}

export interface InMemoryCalendarOptions {
  openHour?: number;
  closeHour?: number;
  slotMinutes?: number;
}

/** Calendar kept in process memory: every slot inside business hours is free until booked. */
export class InMemoryCalendar implements CalendarService {
  private readonly openHour: number;
  private readonly closeHour: number;
  private readonly slotMinutes: number;
  private readonly bookings = new Map<string, Booking>();

  constructor(options: InMemoryCalendarOptions = {}) {
    this.openHour = options.openHour ?? 9;
    this.closeHour = options.closeHour ?? 17;
    this.slotMinutes = options.slotMinutes ?? 30;
  }

  public async availableSlots(date: string): Promise<string[]> {
    return this.allSlots().filter((time) => !this.bookings.has(`${date} ${time}`));
  }

  public async book(request: BookingRequest): Promise<Booking | null> {
    const key = `${request.date} ${request.time}`;
    if (!this.allSlots().includes(request.time) || this.bookings.has(key)) {
      return null;
    }
    const booking: Booking = { ...request, id: randomUUID() };
    this.bookings.set(key, booking);
    return booking;
  }

  public listBookings(): Booking[] {
    return [...this.bookings.values()];
  }

  private allSlots(): string[] {
    const slots: string[] = [];
    for (let minutes = this.openHour * 60; minutes < this.closeHour * 60; minutes += this.slotMinutes) {
      const hour = Math.floor(minutes / 60);
      const minute = minutes % 60;
      slots.push(`${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`);
    }
    return slots;
  }
}
