import { Binary, NoExtension } from '../types';
import { CosmosMsg } from './CosmosMsg';
import { Attribute, AttributeValue, Event, attr } from './Event';
import { SubMsg } from './SubMsg';

/**
 * What a state-mutating entry point hands back to the host: sub-messages to dispatch
 * (in order), emitted events, attributes of the contract's own event and optional data.
 */
export class ContractResponse<C = NoExtension> {
  readonly messages: SubMsg<C>[] = [];
  readonly attributes: Attribute[] = [];
  readonly events: Event[] = [];
  data?: Binary;

  addAttribute(key: string, value: AttributeValue): this {
    this.attributes.push(attr(key, value));
    return this;
  }

  addAttributes(attributes: Iterable<Attribute>): this {
    for (const attribute of attributes) {
      this.attributes.push(attribute);
    }
    return this;
  }

  addMessage(msg: CosmosMsg<C>): this {
    this.messages.push(SubMsg.new<C>(msg));
    return this;
  }

  addMessages(msgs: Iterable<CosmosMsg<C>>): this {
    for (const msg of msgs) {
      this.addMessage(msg);
    }
    return this;
  }

  addSubmessage(subMsg: SubMsg<C>): this {
    this.messages.push(subMsg);
    return this;
  }

  addSubmessages(subMsgs: Iterable<SubMsg<C>>): this {
    for (const subMsg of subMsgs) {
      this.messages.push(subMsg);
    }
    return this;
  }

  addEvent(event: Event): this {
    this.events.push(event);
    return this;
  }

  addEvents(events: Iterable<Event>): this {
    for (const event of events) {
      this.events.push(event);
    }
    return this;
  }

  setData(data: Binary): this {
    this.data = data;
    return this;
  }
}
